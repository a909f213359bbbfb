// Wire format of oracle messages
//
// uint16 msgType | uint16 optionsLength | options | abi-encoded body
//
//   AB  (1): push of vault reports, empty options section
//   ABA (2): request for reports, options section carries the return options

import {
  bytesToHex,
  concat,
  decodeAbiParameters,
  encodeAbiParameters,
  hexToBytes,
  isHex,
  size,
  toHex,
  type Address,
  type Hex,
} from 'viem';
import { match, P } from 'ts-pattern';
import type { VaultReport } from '../types/oracle.ts';
import { OracleError, describeError } from '../errors.ts';

export const MSG_TYPE = {
  AB: 1,
  ABA: 2,
} as const;

export type MessageTypeName = keyof typeof MSG_TYPE;

const HEADER_SIZE = 4;
const MAX_OPTIONS_SIZE = 0xffff;

const REPORTS_BODY = [
  {
    name: 'reports',
    type: 'tuple[]',
    components: [
      { name: 'sharePrice', type: 'uint256' },
      { name: 'lastUpdate', type: 'uint64' },
      { name: 'originChainId', type: 'uint32' },
      { name: 'rewardsDelegate', type: 'address' },
      { name: 'vaultAddress', type: 'address' },
      { name: 'asset', type: 'address' },
      { name: 'assetDecimals', type: 'uint8' },
    ],
  },
] as const;

const REQUEST_BODY = [
  { name: 'vaults', type: 'address[]' },
  { name: 'rewardsDelegate', type: 'address' },
] as const;

export type ReportsMessage = {
  type: 'AB';
  reports: VaultReport[];
};

export type RequestMessage = {
  type: 'ABA';
  vaults: Address[];
  rewardsDelegate: Address;
  returnOptions: Hex;
};

export type OracleMessage = ReportsMessage | RequestMessage;

export function encodeMessage(message: OracleMessage): Hex {
  return match(message)
    .with({ type: 'AB' }, (m) => withHeader(MSG_TYPE.AB, '0x', encodeReports(m.reports)))
    .with({ type: 'ABA' }, (m) =>
      withHeader(
        MSG_TYPE.ABA,
        m.returnOptions,
        encodeAbiParameters(REQUEST_BODY, [m.vaults, m.rewardsDelegate]),
      ),
    )
    .exhaustive();
}

function withHeader(msgType: number, options: Hex, body: Hex): Hex {
  const optionsSize = size(options);
  if (optionsSize > MAX_OPTIONS_SIZE) {
    throw new OracleError('InvalidOptions', `options of ${optionsSize} bytes do not fit the header`);
  }
  return concat([toHex(msgType, { size: 2 }), toHex(optionsSize, { size: 2 }), options, body]);
}

function encodeReports(reports: VaultReport[]): Hex {
  return encodeAbiParameters(REPORTS_BODY, [
    reports.map((r) => ({
      sharePrice: r.sharePrice,
      lastUpdate: BigInt(r.lastUpdate),
      originChainId: r.originChainId,
      rewardsDelegate: r.rewardsDelegate,
      vaultAddress: r.vaultAddress,
      asset: r.asset,
      assetDecimals: r.assetDecimals,
    })),
  ]);
}

export function decodeMessage(payload: Hex): OracleMessage {
  if (!isHex(payload, { strict: true })) {
    throw new OracleError('InvalidMessage', 'payload is not hex');
  }
  const bytes = hexToBytes(payload);
  if (bytes.length < HEADER_SIZE) {
    throw new OracleError('InvalidMessage', `payload of ${bytes.length} bytes is shorter than the header`);
  }
  const view = new DataView(bytes.buffer, bytes.byteOffset, bytes.byteLength);
  const msgType = view.getUint16(0);
  const optionsSize = view.getUint16(2);
  const bodyStart = HEADER_SIZE + optionsSize;
  if (bodyStart > bytes.length) {
    throw new OracleError('InvalidMessage', `options length ${optionsSize} runs past the payload`);
  }
  const options = bytesToHex(bytes.subarray(HEADER_SIZE, bodyStart));
  const body = bytesToHex(bytes.subarray(bodyStart));

  return match(msgType)
    .with(MSG_TYPE.AB, (): OracleMessage => ({ type: 'AB', reports: decodeReports(body) }))
    .with(MSG_TYPE.ABA, (): OracleMessage => {
      const [vaults, rewardsDelegate] = decodeBody(() => decodeAbiParameters(REQUEST_BODY, body));
      return { type: 'ABA', vaults: [...vaults], rewardsDelegate, returnOptions: options };
    })
    .with(P.number, (t): OracleMessage => {
      throw new OracleError('InvalidMessageType', `unknown message type ${t}`);
    })
    .exhaustive();
}

function decodeReports(body: Hex): VaultReport[] {
  const [reports] = decodeBody(() => decodeAbiParameters(REPORTS_BODY, body));
  return reports.map((r) => {
    if (r.lastUpdate > BigInt(Number.MAX_SAFE_INTEGER)) {
      throw new OracleError('InvalidMessage', `lastUpdate ${r.lastUpdate} out of range`);
    }
    return {
      sharePrice: r.sharePrice,
      lastUpdate: Number(r.lastUpdate),
      originChainId: r.originChainId,
      rewardsDelegate: r.rewardsDelegate,
      vaultAddress: r.vaultAddress,
      asset: r.asset,
      assetDecimals: r.assetDecimals,
    };
  });
}

function decodeBody<T>(decode: () => T): T {
  try {
    return decode();
  } catch (error) {
    throw new OracleError('InvalidMessage', `malformed body: ${describeError(error)}`);
  }
}

export function messageTypeOf(message: OracleMessage): number {
  return MSG_TYPE[message.type];
}
