import { ConfigurationError } from "../errors";
import { pow10, signed256 } from "../math";
import type { AdapterConfig, PriceObservation } from "../types";
import type { ExchangeRateSource, PriceFeed } from "./PriceFeed";

export const WRAPPED_TOKEN_PRICE_FEED_VERSION = 1n;
export const DEFAULT_DESCRIPTION = "Custom price feed for wrapped token";

export type WrappedTokenPriceFeedOptions = {
  /** Address the feed is registered under as an asset's price feed. */
  address: string;
  outputDecimals: number;
  description?: string;
};

export type DerivePriceParams = {
  underlyingPrice: bigint;
  exchangeRate: bigint;
  wrappedTokenScale: bigint;
  referenceDecimals: number;
  outputDecimals: number;
};

/**
 * price = underlyingPrice * wrappedTokenScale / exchangeRate, then divided down by
 * 10^(referenceDecimals - outputDecimals). Both divisions truncate toward zero.
 */
export function deriveWrappedPrice(params: DerivePriceParams): bigint {
  const rate = signed256(params.exchangeRate);
  const price = (params.underlyingPrice * params.wrappedTokenScale) / rate;
  return price / pow10(params.referenceDecimals - params.outputDecimals);
}

/**
 * Prices a wrapped yield-bearing token in the reference feed's settlement asset by
 * combining the reference price of the underlying with the token's live exchange rate.
 *
 * The exchange rate is always read at query time, including for historical rounds,
 * so `getRoundData` on an old round pairs that round's price with today's rate.
 */
export class WrappedTokenPriceFeed implements PriceFeed {
  readonly address: string;
  readonly config: AdapterConfig;

  constructor(
    private readonly reference: PriceFeed,
    private readonly token: ExchangeRateSource,
    config: AdapterConfig & { address: string },
  ) {
    const { address, ...adapterConfig } = config;
    if (!Number.isInteger(adapterConfig.outputDecimals) || adapterConfig.outputDecimals < 0) {
      throw new ConfigurationError(`Invalid output decimals: ${adapterConfig.outputDecimals}`);
    }
    if (adapterConfig.outputDecimals > adapterConfig.referenceOracleDecimals) {
      throw new ConfigurationError(
        `Output decimals ${adapterConfig.outputDecimals} exceed reference feed decimals ${adapterConfig.referenceOracleDecimals}`,
        {
          outputDecimals: adapterConfig.outputDecimals,
          referenceOracleDecimals: adapterConfig.referenceOracleDecimals,
        },
      );
    }
    this.address = address;
    this.config = Object.freeze(adapterConfig);
  }

  /** Reads both upstream decimals once and fixes them for the lifetime of the feed. */
  static async create(
    reference: PriceFeed,
    token: ExchangeRateSource,
    opts: WrappedTokenPriceFeedOptions,
  ): Promise<WrappedTokenPriceFeed> {
    const referenceOracleDecimals = await reference.decimals();
    const wrappedTokenDecimals = await token.decimals();
    return new WrappedTokenPriceFeed(reference, token, {
      address: opts.address,
      referenceOracleAddress: reference.address,
      wrappedTokenAddress: token.address,
      referenceOracleDecimals,
      wrappedTokenScale: pow10(wrappedTokenDecimals),
      outputDecimals: opts.outputDecimals,
      description: opts.description ?? DEFAULT_DESCRIPTION,
    });
  }

  async decimals(): Promise<number> {
    return this.config.outputDecimals;
  }

  async description(): Promise<string> {
    return this.config.description;
  }

  async version(): Promise<bigint> {
    return WRAPPED_TOKEN_PRICE_FEED_VERSION;
  }

  async getRoundData(roundId: bigint): Promise<PriceObservation> {
    return this.derive(await this.reference.getRoundData(roundId));
  }

  async latestRoundData(): Promise<PriceObservation> {
    return this.derive(await this.reference.latestRoundData());
  }

  private async derive(observation: PriceObservation): Promise<PriceObservation> {
    const exchangeRate = await this.token.exchangeRate();
    const price = deriveWrappedPrice({
      underlyingPrice: observation.price,
      exchangeRate,
      wrappedTokenScale: this.config.wrappedTokenScale,
      referenceDecimals: this.config.referenceOracleDecimals,
      outputDecimals: this.config.outputDecimals,
    });
    return {
      roundId: observation.roundId,
      price,
      startedAt: observation.startedAt,
      updatedAt: observation.updatedAt,
      answeredInRound: observation.answeredInRound,
    };
  }
}
