import { PriceFeedError, PriceFeedErrorCodes } from "../errors";
import type { PriceObservation } from "../types";
import type { PriceFeed } from "./PriceFeed";

export type SimplePriceFeedOptions = {
  address: string;
  decimals: number;
  description?: string;
  initialPrice?: bigint;
  now?: () => bigint;
};

function nowSec(): bigint {
  return BigInt(Math.floor(Date.now() / 1000));
}

/**
 * Settable in-memory feed. Stands in for an aggregator on development networks.
 */
export class SimplePriceFeed implements PriceFeed {
  readonly address: string;
  private readonly feedDecimals: number;
  private readonly feedDescription: string;
  private readonly now: () => bigint;

  private readonly rounds = new Map<bigint, PriceObservation>();
  private latestRoundId?: bigint;

  constructor(opts: SimplePriceFeedOptions) {
    this.address = opts.address;
    this.feedDecimals = opts.decimals;
    this.feedDescription = opts.description ?? "Simple price feed";
    this.now = opts.now ?? nowSec;
    if (opts.initialPrice !== undefined) this.setPrice(opts.initialPrice);
  }

  async decimals(): Promise<number> {
    return this.feedDecimals;
  }

  async description(): Promise<string> {
    return this.feedDescription;
  }

  async version(): Promise<bigint> {
    return 1n;
  }

  async getRoundData(roundId: bigint): Promise<PriceObservation> {
    const round = this.rounds.get(roundId);
    if (!round) {
      throw new PriceFeedError("No data present", PriceFeedErrorCodes.NoDataPresent, {
        roundId: roundId.toString(),
      });
    }
    return { ...round };
  }

  async latestRoundData(): Promise<PriceObservation> {
    if (this.latestRoundId === undefined) {
      throw new PriceFeedError("No data present", PriceFeedErrorCodes.NoDataPresent);
    }
    return this.getRoundData(this.latestRoundId);
  }

  /** Appends a new round answered in itself. */
  setPrice(price: bigint, timestamp: bigint = this.now()): PriceObservation {
    const roundId = (this.latestRoundId ?? 0n) + 1n;
    return this.setRoundData({
      roundId,
      price,
      startedAt: timestamp,
      updatedAt: timestamp,
      answeredInRound: roundId,
    });
  }

  setRoundData(round: PriceObservation): PriceObservation {
    const stored = { ...round };
    this.rounds.set(stored.roundId, stored);
    if (this.latestRoundId === undefined || stored.roundId > this.latestRoundId) {
      this.latestRoundId = stored.roundId;
    }
    return { ...stored };
  }
}
