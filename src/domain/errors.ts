// Error taxonomy for every call into the strategy. Any of these aborts the
// enclosing call; the journal rolls all state back before the error surfaces.

export type ErrorKind =
  | 'authorization'
  | 'validation'
  | 'slippage'
  | 'proportionality'
  | 'external-call'
  | 'oracle'
  | 'configuration';

export type ErrorDetails = Record<string, string>;

export type AuthorizationCode = 'Unauthorized' | 'ReentrantCall';
export type ValidationCode =
  | 'InvalidToken'
  | 'InvalidAmount'
  | 'InvalidPercentage'
  | 'InvalidRouter'
  | 'UnknownCommand'
  | 'InvalidKeeperCommand'
  | 'MalformedPayload'
  | 'ZeroAddress'
  | 'InvalidMarket'
  | 'InvalidUnderlying'
  | 'InvalidPriceFeed';
export type SlippageCode = 'SlippageTooHigh' | 'OracleSlippageCheckFailed';
export type ProportionalityCode = 'InvalidAmount';
export type ExternalCallCode = 'SwapFailed' | 'ProtocolCallFailed' | 'TransferFailed';
export type OracleCode =
  | 'PriceFeedNotFound'
  | 'PriceDataTooOld'
  | 'InvalidPrice'
  | 'DecimalsMismatch'
  | 'UnderlyingMissingPriceFeed';
export type ConfigurationCode = 'ZeroBasePrice';

export type ErrorCode =
  | AuthorizationCode
  | ValidationCode
  | SlippageCode
  | ProportionalityCode
  | ExternalCallCode
  | OracleCode
  | ConfigurationCode;

export class StrategyError extends Error {
  constructor(
    readonly kind: ErrorKind,
    readonly code: ErrorCode,
    message: string,
    readonly details: ErrorDetails = {},
  ) {
    super(message);
    this.name = new.target.name;
  }
}

export class AuthorizationError extends StrategyError {
  constructor(code: AuthorizationCode, message: string, details?: ErrorDetails) {
    super('authorization', code, message, details);
  }
}

export class ValidationError extends StrategyError {
  constructor(code: ValidationCode, message: string, details?: ErrorDetails) {
    super('validation', code, message, details);
  }
}

export class SlippageError extends StrategyError {
  constructor(code: SlippageCode, message: string, details?: ErrorDetails) {
    super('slippage', code, message, details);
  }
}

export class ProportionalityError extends StrategyError {
  constructor(code: ProportionalityCode, message: string, details?: ErrorDetails) {
    super('proportionality', code, message, details);
  }
}

export class ExternalCallError extends StrategyError {
  constructor(code: ExternalCallCode, message: string, details?: ErrorDetails) {
    super('external-call', code, message, details);
  }
}

export class OracleError extends StrategyError {
  constructor(code: OracleCode, message: string, details?: ErrorDetails) {
    super('oracle', code, message, details);
  }
}

export class ConfigurationError extends StrategyError {
  constructor(code: ConfigurationCode, message: string, details?: ErrorDetails) {
    super('configuration', code, message, details);
  }
}

export function isStrategyError(err: unknown): err is StrategyError {
  return err instanceof StrategyError;
}

export function reasonOf(err: unknown): string {
  if (err instanceof StrategyError) return `${err.code}: ${err.message}`;
  if (err instanceof Error) return err.message;
  return String(err);
}
