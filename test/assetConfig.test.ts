import { ethers } from "ethers";
import { describe, expect, it } from "vitest";

import {
  decodePackedAssetConfig,
  encodePackedAssetConfig,
  FACTOR_SCALE,
  packAssetConfig,
  unpackAssetConfig,
  validateAssetConfig,
} from "../src/assets/assetConfig";
import { ConfigurationError } from "../src/errors";
import type { AssetConfig } from "../src/types";

const E18 = 10n ** 18n;

function weth(overrides: Partial<AssetConfig> = {}): AssetConfig {
  return {
    asset: "0x3000000000000000000000000000000000000002",
    priceFeed: "0x2000000000000000000000000000000000000002",
    decimals: 18,
    borrowCollateralFactor: 800_000_000_000_000_000n,
    liquidateCollateralFactor: 850_000_000_000_000_000n,
    liquidationFactor: 930_000_000_000_000_000n,
    supplyCap: 100_000n * E18,
    ...overrides,
  };
}

describe("packAssetConfig", () => {
  it("lays out both words as the protocol stores them", () => {
    const packed = packAssetConfig(weth());

    expect(packed.wordA & ((1n << 160n) - 1n)).toBe(BigInt("0x3000000000000000000000000000000000000002"));
    expect((packed.wordA >> 160n) & 0xffffn).toBe(8000n);
    expect((packed.wordA >> 176n) & 0xffffn).toBe(8500n);
    expect((packed.wordA >> 192n) & 0xffffn).toBe(9300n);
    expect(packed.wordA >> 208n).toBe(0n);

    expect(packed.wordB & ((1n << 160n) - 1n)).toBe(BigInt("0x2000000000000000000000000000000000000002"));
    expect((packed.wordB >> 160n) & 0xffn).toBe(18n);
    expect(packed.wordB >> 168n).toBe(100_000n);
  });

  it("encodes each word as 32 bytes of hex", () => {
    const encoded = encodePackedAssetConfig(packAssetConfig(weth()));
    expect(encoded.wordB).toBe(`0x${"0".repeat(17)}186a0122000000000000000000000000000000000000002`);
    expect(encoded.wordA).toBe(`0x${"0".repeat(12)}245421341f403000000000000000000000000000000000000002`);
    expect(decodePackedAssetConfig(encoded)).toEqual(packAssetConfig(weth()));
  });

  it("rejects factors outside [0, 1]", () => {
    expect(() => packAssetConfig(weth({ borrowCollateralFactor: FACTOR_SCALE + 1n }))).toThrow(ConfigurationError);
    expect(() => packAssetConfig(weth({ liquidationFactor: -1n }))).toThrow(ConfigurationError);
  });

  it("rejects factors finer than four decimal digits instead of truncating them", () => {
    expect(() => packAssetConfig(weth({ liquidateCollateralFactor: 850_000_000_000_000_001n }))).toThrow(
      /liquidateCollateralFactor has more precision than storage keeps/,
    );
  });

  it("rejects supply caps that are fractional or wider than 64 bits of whole tokens", () => {
    expect(() => packAssetConfig(weth({ supplyCap: E18 + 1n }))).toThrow(/not a whole number of tokens/);
    expect(() => packAssetConfig(weth({ supplyCap: (1n << 64n) * E18 }))).toThrow(/does not fit in 64 bits/);
    expect(() => packAssetConfig(weth({ supplyCap: -E18 }))).toThrow(ConfigurationError);
  });

  it("rejects malformed addresses and decimals outside uint8", () => {
    expect(() => packAssetConfig(weth({ priceFeed: "0x1234" }))).toThrow(/Invalid address for priceFeed/);
    expect(() => packAssetConfig(weth({ asset: "not an address" }))).toThrow(/Invalid address for asset/);
    expect(() => validateAssetConfig(weth({ decimals: 256 }))).toThrow(ConfigurationError);
    expect(() => validateAssetConfig(weth({ decimals: -1 }))).toThrow(ConfigurationError);
  });
});

describe("unpackAssetConfig", () => {
  it("round-trips valid configurations", () => {
    const configs: AssetConfig[] = [
      weth(),
      weth({ decimals: 0, supplyCap: 0n, borrowCollateralFactor: 0n, liquidateCollateralFactor: 0n, liquidationFactor: 0n }),
      weth({
        asset: ethers.utils.getAddress("0xffffffffffffffffffffffffffffffffffffffff"),
        priceFeed: ethers.utils.getAddress("0xabcdefabcdefabcdefabcdefabcdefabcdefabcd"),
        decimals: 8,
        borrowCollateralFactor: FACTOR_SCALE,
        liquidateCollateralFactor: FACTOR_SCALE,
        liquidationFactor: 100_000_000_000_000n,
        supplyCap: ((1n << 64n) - 1n) * 10n ** 8n,
      }),
      weth({ decimals: 255, supplyCap: 3n * 10n ** 255n }),
    ];

    for (const config of configs) {
      expect(unpackAssetConfig(packAssetConfig(config))).toEqual(config);
    }
  });

  it("checksums addresses on the way out", () => {
    const lower = "0xabcdefabcdefabcdefabcdefabcdefabcdefabcd";
    const unpacked = unpackAssetConfig(packAssetConfig(weth({ asset: lower })));
    expect(unpacked.asset).toBe(ethers.utils.getAddress(lower));
  });

  it("rejects words with bits outside the layout", () => {
    const packed = packAssetConfig(weth());
    expect(() => unpackAssetConfig({ ...packed, wordA: packed.wordA | (1n << 208n) })).toThrow(/word_a/);
    expect(() => unpackAssetConfig({ ...packed, wordB: packed.wordB | (1n << 240n) })).toThrow(/word_b/);
  });

  it("rejects stored factors above 100%", () => {
    const packed = packAssetConfig(weth());
    const overScale = (packed.wordA & ~(0xffffn << 160n)) | (10_001n << 160n);
    expect(() => unpackAssetConfig({ ...packed, wordA: overScale })).toThrow(/borrowCollateralFactor out of range/);
  });

  it("rejects encoded words that are not 32 bytes", () => {
    expect(() => decodePackedAssetConfig({ wordA: "0x12", wordB: `0x${"0".repeat(64)}` })).toThrow(ConfigurationError);
  });
});
