import { OracleError, describeError, isOracleError } from '../errors.ts';
import { attempt } from '../types/result.ts';

describe('OracleError', () => {
  test('prefixes the message with the code and derives the category', () => {
    const error = new OracleError('OnlyPeer', 'sender is not the peer', { srcEid: 30109 });
    expect(error.message).toBe('OnlyPeer: sender is not the peer');
    expect(error.category).toBe('authentication');
    expect(error.details).toEqual({ srcEid: 30109 });
  });

  test('isOracleError optionally matches the code', () => {
    const error = new OracleError('NoValidPrice', 'nothing');
    expect(isOracleError(error)).toBe(true);
    expect(isOracleError(error, 'NoValidPrice')).toBe(true);
    expect(isOracleError(error, 'InvalidPrice')).toBe(false);
    expect(isOracleError(new Error('NoValidPrice: nothing'))).toBe(false);
  });

  test('describeError handles non-errors', () => {
    expect(describeError(new Error('boom'))).toBe('boom');
    expect(describeError('plain')).toBe('plain');
  });
});

describe('attempt', () => {
  test('wraps values and thrown errors', async () => {
    await expect(attempt(async () => 42)).resolves.toEqual({ ok: true, value: 42 });

    const failure = new OracleError('InvalidPrice', 'zero');
    await expect(
      attempt(async () => {
        throw failure;
      }),
    ).resolves.toEqual({ ok: false, error: failure });
  });
});
