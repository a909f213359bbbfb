/**
 * JSON.stringify replacer writing bigints as decimal strings
 */
const bigIntReplacer = (_key: string, value: unknown): unknown =>
  typeof value === 'bigint' ? value.toString() : value;

export const stringifyWithBigInt = (data: unknown): string => JSON.stringify(data, bigIntReplacer);
