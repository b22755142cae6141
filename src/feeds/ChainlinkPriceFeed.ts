import { ethers, type BigNumberish } from "ethers";

import { toBigInt } from "../math";
import type { PriceObservation } from "../types";
import type { PriceFeed } from "./PriceFeed";

export const AGGREGATOR_V3_ABI = [
  "function decimals() view returns (uint8)",
  "function description() view returns (string)",
  "function version() view returns (uint256)",
  "function getRoundData(uint80 _roundId) view returns (uint80 roundId, int256 answer, uint256 startedAt, uint256 updatedAt, uint80 answeredInRound)",
  "function latestRoundData() view returns (uint80 roundId, int256 answer, uint256 startedAt, uint256 updatedAt, uint80 answeredInRound)",
];

type RawRoundData = {
  roundId: BigNumberish;
  answer: BigNumberish;
  startedAt: BigNumberish;
  updatedAt: BigNumberish;
  answeredInRound: BigNumberish;
};

type FeedMetadata = {
  decimals: number;
  description: string;
  version: bigint;
};

function toObservation(raw: RawRoundData): PriceObservation {
  return {
    roundId: toBigInt(raw.roundId),
    price: toBigInt(raw.answer),
    startedAt: toBigInt(raw.startedAt),
    updatedAt: toBigInt(raw.updatedAt),
    answeredInRound: toBigInt(raw.answeredInRound),
  };
}

/**
 * Primary feed reading an on-chain aggregator. Metadata is read once in `connect`;
 * round data is read on every call.
 */
export class ChainlinkPriceFeed implements PriceFeed {
  private constructor(
    readonly address: string,
    private readonly contract: ethers.Contract,
    private readonly metadata: FeedMetadata,
  ) { }

  static async connect(address: string, provider: ethers.providers.Provider): Promise<ChainlinkPriceFeed> {
    const contract = new ethers.Contract(address, AGGREGATOR_V3_ABI, provider);
    const [decimals, description, version] = await Promise.all([
      contract.decimals(),
      contract.description(),
      contract.version(),
    ]);
    return new ChainlinkPriceFeed(address, contract, {
      decimals: Number(decimals),
      description: String(description),
      version: toBigInt(version),
    });
  }

  async decimals(): Promise<number> {
    return this.metadata.decimals;
  }

  async description(): Promise<string> {
    return this.metadata.description;
  }

  async version(): Promise<bigint> {
    return this.metadata.version;
  }

  async getRoundData(roundId: bigint): Promise<PriceObservation> {
    return toObservation(await this.contract.getRoundData(roundId.toString()));
  }

  async latestRoundData(): Promise<PriceObservation> {
    return toObservation(await this.contract.latestRoundData());
  }
}
