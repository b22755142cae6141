import type { PriceObservation } from "../types";

/**
 * Round-data interface shared by primary (aggregator-backed) and derived feeds.
 * Callers are written against this and never need to know which one they hold.
 */
export interface PriceFeed {
  readonly address: string;
  decimals(): Promise<number>;
  description(): Promise<string>;
  version(): Promise<bigint>;
  getRoundData(roundId: bigint): Promise<PriceObservation>;
  latestRoundData(): Promise<PriceObservation>;
}

/**
 * A wrapped token that reports how many underlying units one wrapped unit is worth,
 * scaled by the underlying's decimals.
 */
export interface ExchangeRateSource {
  readonly address: string;
  decimals(): Promise<number>;
  exchangeRate(): Promise<bigint>;
}
