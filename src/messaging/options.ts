// Type-3 execution options
//
// Layout: 0x0003 | (workerId uint8 | size uint16 | optionType uint8 | option bytes)*
// where size counts the optionType byte plus the option bytes.

import { concat, hexToBytes, isHex, size, toHex, type Hex } from 'viem';
import { OracleError } from '../errors.ts';

export const OPTIONS_TYPE_3 = 3;
export const EXECUTOR_WORKER_ID = 1;
export const OPTION_TYPE_LZRECEIVE = 1;

const TYPE_3_PREFIX: Hex = '0x0003';
const MAX_UINT128 = (1n << 128n) - 1n;

export type ExecutorOption = {
  workerId: number;
  optionType: number;
  option: Hex;
};

export function newOptions(): Hex {
  return TYPE_3_PREFIX;
}

export function addExecutorLzReceiveOption(options: Hex, gas: bigint, value = 0n): Hex {
  assertType3(options);
  if (gas < 0n || gas > MAX_UINT128 || value < 0n || value > MAX_UINT128) {
    throw new OracleError('InvalidOptions', 'gas and value must fit in uint128');
  }
  const option = value === 0n ? toHex(gas, { size: 16 }) : concat([toHex(gas, { size: 16 }), toHex(value, { size: 16 })]);
  return concat([
    options,
    toHex(EXECUTOR_WORKER_ID, { size: 1 }),
    toHex(size(option) + 1, { size: 2 }),
    toHex(OPTION_TYPE_LZRECEIVE, { size: 1 }),
    option,
  ]);
}

// Fresh type-3 options with a single executor receive option
export function buildReceiveOption(gas: bigint, value = 0n): Hex {
  return addExecutorLzReceiveOption(newOptions(), gas, value);
}

export function isType3(options: Hex): boolean {
  return isHex(options) && size(options) >= 2 && options.slice(0, 6).toLowerCase() === TYPE_3_PREFIX;
}

function assertType3(options: Hex): void {
  if (!isType3(options)) {
    throw new OracleError('InvalidOptions', `expected type-3 options, got ${options.slice(0, 6)}`);
  }
}

/**
 * Merge enforced options with caller options. Enforced options always stay in
 * front; the caller's options are appended without their type prefix.
 */
export function combineOptions(enforced: Hex | undefined, extra: Hex): Hex {
  if (enforced === undefined || enforced === '0x') return extra;
  if (extra === '0x') return enforced;

  if (!isType3(enforced) || !isType3(extra)) {
    throw new OracleError('InvalidOptions', 'enforced and caller options must both be type 3');
  }
  return concat([enforced, `0x${extra.slice(6)}`]);
}

export function decodeOptions(options: Hex): ExecutorOption[] {
  assertType3(options);
  const bytes = hexToBytes(options);
  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  const decoded: ExecutorOption[] = [];

  let cursor = 2;
  while (cursor < bytes.length) {
    if (cursor + 4 > bytes.length) {
      throw new OracleError('InvalidOptions', `truncated option header at byte ${cursor}`);
    }
    const workerId = view.getUint8(cursor);
    const optionSize = view.getUint16(cursor + 1);
    const end = cursor + 3 + optionSize;
    if (optionSize === 0 || end > bytes.length) {
      throw new OracleError('InvalidOptions', `option at byte ${cursor} runs past the end`);
    }
    decoded.push({
      workerId,
      optionType: view.getUint8(cursor + 3),
      option: toHex(bytes.subarray(cursor + 4, end)),
    });
    cursor = end;
  }
  return decoded;
}

/**
 * Sum of the gas and native value requested by executor receive options.
 */
export function executorReceiveTotals(options: Hex): { gas: bigint; value: bigint } {
  let gas = 0n;
  let value = 0n;
  for (const opt of decodeOptions(options)) {
    if (opt.workerId !== EXECUTOR_WORKER_ID || opt.optionType !== OPTION_TYPE_LZRECEIVE) continue;
    const bytes = hexToBytes(opt.option);
    if (bytes.length !== 16 && bytes.length !== 32) {
      throw new OracleError('InvalidOptions', `receive option of ${bytes.length} bytes`);
    }
    gas += BigInt(toHex(bytes.subarray(0, 16)));
    if (bytes.length === 32) value += BigInt(toHex(bytes.subarray(16)));
  }
  return { gas, value };
}
