export type HexString = `0x${string}`;

// Round-data observation as reported by an aggregator-style feed.
export type PriceObservation = {
  roundId: bigint; // uint80 on chain, opaque
  price: bigint; // int256, scaled by the reporting feed's decimals
  startedAt: bigint; // seconds
  updatedAt: bigint; // seconds
  answeredInRound: bigint;
};

export type AdapterConfig = Readonly<{
  referenceOracleAddress: string;
  wrappedTokenAddress: string;
  referenceOracleDecimals: number;
  wrappedTokenScale: bigint; // 10 ^ wrappedToken.decimals()
  outputDecimals: number;
  description: string;
}>;

// Unpacked asset configuration (tooling / interchange shape).
export type AssetConfig = {
  asset: string;
  priceFeed: string;
  decimals: number;
  borrowCollateralFactor: bigint; // scaled by FACTOR_SCALE
  liquidateCollateralFactor: bigint;
  liquidationFactor: bigint;
  supplyCap: bigint; // asset base units
};

// Storage shape: exactly two uint256 words.
export type PackedAssetConfig = {
  wordA: bigint;
  wordB: bigint;
};

export type EncodedPackedAssetConfig = {
  wordA: HexString;
  wordB: HexString;
};
