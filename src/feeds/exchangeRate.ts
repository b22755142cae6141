import { ethers } from "ethers";

import { InvalidMagnitudeError } from "../errors";
import { pow10, toBigInt } from "../math";
import type { ExchangeRateSource } from "./PriceFeed";

export const STETH_PER_TOKEN_ABI = [
  "function decimals() view returns (uint8)",
  "function stEthPerToken() view returns (uint256)",
];

export const ERC4626_ABI = [
  "function decimals() view returns (uint8)",
  "function convertToAssets(uint256 shares) view returns (uint256)",
];

export type ExchangeRateSourceKind = "stEthPerToken" | "erc4626";

function unsigned(value: bigint, source: string): bigint {
  if (value < 0n) {
    throw new InvalidMagnitudeError(`Negative exchange rate from ${source}: ${value}`, { value: value.toString() });
  }
  return value;
}

/** Wrapped staking token exposing `stEthPerToken()` (wstETH and its clones). */
export class StEthPerTokenSource implements ExchangeRateSource {
  private readonly contract: ethers.Contract;

  constructor(readonly address: string, provider: ethers.providers.Provider) {
    this.contract = new ethers.Contract(address, STETH_PER_TOKEN_ABI, provider);
  }

  async decimals(): Promise<number> {
    return Number(await this.contract.decimals());
  }

  async exchangeRate(): Promise<bigint> {
    return unsigned(toBigInt(await this.contract.stEthPerToken()), this.address);
  }
}

/** ERC-4626 vault share: the rate is the assets redeemable for one whole share. */
export class Erc4626ExchangeRateSource implements ExchangeRateSource {
  private readonly contract: ethers.Contract;
  private oneShare?: bigint;

  constructor(readonly address: string, provider: ethers.providers.Provider) {
    this.contract = new ethers.Contract(address, ERC4626_ABI, provider);
  }

  async decimals(): Promise<number> {
    return Number(await this.contract.decimals());
  }

  async exchangeRate(): Promise<bigint> {
    if (this.oneShare === undefined) this.oneShare = pow10(await this.decimals());
    return unsigned(toBigInt(await this.contract.convertToAssets(this.oneShare.toString())), this.address);
  }
}

export class StaticExchangeRateSource implements ExchangeRateSource {
  constructor(
    readonly address: string,
    private readonly tokenDecimals: number,
    private rate: bigint,
  ) { }

  async decimals(): Promise<number> {
    return this.tokenDecimals;
  }

  async exchangeRate(): Promise<bigint> {
    return this.rate;
  }

  setExchangeRate(rate: bigint): void {
    this.rate = rate;
  }
}

export function connectExchangeRateSource(
  kind: ExchangeRateSourceKind,
  address: string,
  provider: ethers.providers.Provider,
): ExchangeRateSource {
  switch (kind) {
    case "stEthPerToken":
      return new StEthPerTokenSource(address, provider);
    case "erc4626":
      return new Erc4626ExchangeRateSource(address, provider);
  }
}
