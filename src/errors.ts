// Typed failures raised by the oracle, the conversion engine and the messenger

export type OracleErrorCode =
  // source exhaustion
  | 'NoAdaptersConfigured'
  | 'NoValidPrice'
  // validation
  | 'InvalidChainId'
  | 'InvalidPrice'
  | 'ExceedsMaxReports'
  | 'InvalidAssetType'
  | 'InvalidAddress'
  | 'InvalidOptions'
  | 'InvalidMessage'
  | 'InvalidMessageType'
  // authentication
  | 'PeerNotSet'
  | 'OnlyPeer'
  // replay
  | 'MessageAlreadyProcessed'
  // liveness
  | 'SequencerDown'
  | 'GracePeriodNotOver'
  // transport
  | 'InsufficientFee'
  | 'UnknownEndpoint'
  // admin
  | 'AdapterAlreadyExists'
  | 'AdapterNotFound'
  | 'InvalidPriority';

export type ErrorCategory =
  | 'source-exhaustion'
  | 'validation'
  | 'authentication'
  | 'replay'
  | 'liveness'
  | 'transport'
  | 'admin';

const CATEGORY_BY_CODE: Record<OracleErrorCode, ErrorCategory> = {
  NoAdaptersConfigured: 'source-exhaustion',
  NoValidPrice: 'source-exhaustion',
  InvalidChainId: 'validation',
  InvalidPrice: 'validation',
  ExceedsMaxReports: 'validation',
  InvalidAssetType: 'validation',
  InvalidAddress: 'validation',
  InvalidOptions: 'validation',
  InvalidMessage: 'validation',
  InvalidMessageType: 'validation',
  PeerNotSet: 'authentication',
  OnlyPeer: 'authentication',
  MessageAlreadyProcessed: 'replay',
  SequencerDown: 'liveness',
  GracePeriodNotOver: 'liveness',
  InsufficientFee: 'transport',
  UnknownEndpoint: 'transport',
  AdapterAlreadyExists: 'admin',
  AdapterNotFound: 'admin',
  InvalidPriority: 'admin',
};

export class OracleError extends Error {
  readonly code: OracleErrorCode;
  readonly category: ErrorCategory;
  readonly details?: Record<string, unknown>;

  constructor(code: OracleErrorCode, message: string, details?: Record<string, unknown>) {
    super(`${code}: ${message}`);
    this.name = 'OracleError';
    this.code = code;
    this.category = CATEGORY_BY_CODE[code];
    this.details = details;
  }
}

export function isOracleError(err: unknown, code?: OracleErrorCode): err is OracleError {
  return err instanceof OracleError && (code === undefined || err.code === code);
}

export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
