// Contract consumed from the underlying messaging network

import { encodePacked, keccak256, pad, size, slice, getAddress, type Address, type Hex } from 'viem';
import { OracleError } from '../errors.ts';

export type MessagingFee = {
  nativeFee: bigint;
  tokenFee: bigint;
};

export type MessagingReceipt = {
  guid: Hex;
  nonce: bigint;
  fee: MessagingFee;
};

export type Origin = {
  srcEid: number;
  sender: Hex; // bytes32
  nonce: bigint;
};

// What the network hands to the receiving side
export type InboundPacket = {
  origin: Origin;
  guid: Hex;
  message: Hex;
  // native value forwarded with the delivery
  value: bigint;
};

export interface MessagingTransport {
  quote(dstEid: number, message: Hex, options: Hex): Promise<MessagingFee>;
  send(dstEid: number, message: Hex, options: Hex, fee: MessagingFee): Promise<MessagingReceipt>;
}

export function addressToBytes32(address: Address): Hex {
  return pad(getAddress(address), { size: 32 });
}

export function bytes32ToAddress(value: Hex): Address {
  if (size(value) !== 32) {
    throw new OracleError('InvalidAddress', `expected 32 bytes, got ${size(value)}`);
  }
  return getAddress(slice(value, 12, 32));
}

/**
 * Delivery identifier: keccak256(nonce | srcEid | sender | dstEid | receiver).
 */
export function computeGuid(nonce: bigint, srcEid: number, sender: Hex, dstEid: number, receiver: Hex): Hex {
  return keccak256(
    encodePacked(
      ['uint64', 'uint32', 'bytes32', 'uint32', 'bytes32'],
      [nonce, srcEid, sender, dstEid, receiver],
    ),
  );
}
