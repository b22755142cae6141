export const PriceFeedErrorCodes = {
  InvalidParams: -32602,
  InternalError: -32603,
  Configuration: -32010,
  InvalidMagnitude: -32011,
  NoDataPresent: -32012,
} as const;

export type PriceFeedErrorCode = (typeof PriceFeedErrorCodes)[keyof typeof PriceFeedErrorCodes];

export class PriceFeedError extends Error {
  constructor(
    message: string,
    public readonly code: PriceFeedErrorCode,
    public readonly data?: unknown,
  ) {
    super(message);
    this.name = new.target.name;
  }
}

/** Invalid construction or load-time input. The instance is unusable; fix the inputs and rebuild. */
export class ConfigurationError extends PriceFeedError {
  constructor(message: string, data?: unknown) {
    super(message, PriceFeedErrorCodes.Configuration, data);
  }
}

/** An unsigned value that cannot be reinterpreted as int256. */
export class InvalidMagnitudeError extends PriceFeedError {
  constructor(message: string, data?: unknown) {
    super(message, PriceFeedErrorCodes.InvalidMagnitude, data);
  }
}
