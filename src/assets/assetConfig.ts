import { ethers } from "ethers";

import { ConfigurationError } from "../errors";
import { pow10 } from "../math";
import type { AssetConfig, EncodedPackedAssetConfig, HexString, PackedAssetConfig } from "../types";

export const FACTOR_SCALE = 10n ** 18n;
// Factors are stored with four decimal digits.
const FACTOR_DESCALE = FACTOR_SCALE / 10n ** 4n;

const ADDRESS_MASK = (1n << 160n) - 1n;
const UINT8_MAX = 255;
const UINT16_MASK = (1n << 16n) - 1n;
const UINT64_MAX = (1n << 64n) - 1n;

// word_a: asset | borrowCF << 160 | liquidateCF << 176 | liquidationFactor << 192
const BORROW_CF_OFFSET = 160n;
const LIQUIDATE_CF_OFFSET = 176n;
const LIQUIDATION_FACTOR_OFFSET = 192n;
const WORD_A_BITS = 208n;

// word_b: priceFeed | decimals << 160 | supplyCap << 168
const DECIMALS_OFFSET = 160n;
const SUPPLY_CAP_OFFSET = 168n;
const WORD_B_BITS = 232n;

type FactorField = "borrowCollateralFactor" | "liquidateCollateralFactor" | "liquidationFactor";

const FACTOR_FIELDS: FactorField[] = ["borrowCollateralFactor", "liquidateCollateralFactor", "liquidationFactor"];

const ADDRESS_REGEX = /^0x[a-fA-F0-9]{40}$/;

function requireAddress(value: string, field: string): void {
  if (!ADDRESS_REGEX.test(value) || !ethers.utils.isAddress(value)) {
    throw new ConfigurationError(`Invalid address for ${field}: ${value}`, { field, value });
  }
}

export function validateAssetConfig(config: AssetConfig): void {
  requireAddress(config.asset, "asset");
  requireAddress(config.priceFeed, "priceFeed");

  if (!Number.isInteger(config.decimals) || config.decimals < 0 || config.decimals > UINT8_MAX) {
    throw new ConfigurationError(`decimals out of range [0, ${UINT8_MAX}]: ${config.decimals}`, {
      asset: config.asset,
    });
  }

  for (const field of FACTOR_FIELDS) {
    const value = config[field];
    if (value < 0n || value > FACTOR_SCALE) {
      throw new ConfigurationError(`${field} out of range [0, ${FACTOR_SCALE}]: ${value}`, {
        asset: config.asset,
        field,
      });
    }
  }

  if (config.supplyCap < 0n) {
    throw new ConfigurationError(`supplyCap is negative: ${config.supplyCap}`, { asset: config.asset });
  }
}

function descaleFactor(config: AssetConfig, field: FactorField): bigint {
  const value = config[field];
  if (value % FACTOR_DESCALE !== 0n) {
    throw new ConfigurationError(`${field} has more precision than storage keeps: ${value}`, {
      asset: config.asset,
      field,
    });
  }
  return value / FACTOR_DESCALE;
}

function descaleSupplyCap(config: AssetConfig): bigint {
  const scale = pow10(config.decimals);
  if (config.supplyCap % scale !== 0n) {
    throw new ConfigurationError(`supplyCap is not a whole number of tokens: ${config.supplyCap}`, {
      asset: config.asset,
    });
  }
  const wholeTokens = config.supplyCap / scale;
  if (wholeTokens > UINT64_MAX) {
    throw new ConfigurationError(`supplyCap does not fit in 64 bits: ${wholeTokens}`, { asset: config.asset });
  }
  return wholeTokens;
}

export function packAssetConfig(config: AssetConfig): PackedAssetConfig {
  validateAssetConfig(config);

  const wordA =
    BigInt(config.asset) |
    (descaleFactor(config, "borrowCollateralFactor") << BORROW_CF_OFFSET) |
    (descaleFactor(config, "liquidateCollateralFactor") << LIQUIDATE_CF_OFFSET) |
    (descaleFactor(config, "liquidationFactor") << LIQUIDATION_FACTOR_OFFSET);

  const wordB =
    BigInt(config.priceFeed) |
    (BigInt(config.decimals) << DECIMALS_OFFSET) |
    (descaleSupplyCap(config) << SUPPLY_CAP_OFFSET);

  return { wordA, wordB };
}

function wordToAddress(word: bigint): string {
  return ethers.utils.getAddress(`0x${(word & ADDRESS_MASK).toString(16).padStart(40, "0")}`);
}

export function unpackAssetConfig(packed: PackedAssetConfig): AssetConfig {
  const { wordA, wordB } = packed;
  if (wordA < 0n || wordA >> WORD_A_BITS !== 0n) {
    throw new ConfigurationError("word_a has bits set outside the asset layout", { wordA: wordA.toString() });
  }
  if (wordB < 0n || wordB >> WORD_B_BITS !== 0n) {
    throw new ConfigurationError("word_b has bits set outside the asset layout", { wordB: wordB.toString() });
  }

  const decimals = Number((wordB >> DECIMALS_OFFSET) & BigInt(UINT8_MAX));
  const config: AssetConfig = {
    asset: wordToAddress(wordA),
    priceFeed: wordToAddress(wordB),
    decimals,
    borrowCollateralFactor: ((wordA >> BORROW_CF_OFFSET) & UINT16_MASK) * FACTOR_DESCALE,
    liquidateCollateralFactor: ((wordA >> LIQUIDATE_CF_OFFSET) & UINT16_MASK) * FACTOR_DESCALE,
    liquidationFactor: ((wordA >> LIQUIDATION_FACTOR_OFFSET) & UINT16_MASK) * FACTOR_DESCALE,
    supplyCap: (wordB >> SUPPLY_CAP_OFFSET) * pow10(decimals),
  };

  validateAssetConfig(config);
  return config;
}

function toWord(value: bigint): HexString {
  return `0x${value.toString(16).padStart(64, "0")}`;
}

function fromWord(value: string, field: string): bigint {
  if (!ethers.utils.isHexString(value, 32)) {
    throw new ConfigurationError(`Invalid 32-byte word for ${field}: ${value}`, { field, value });
  }
  return BigInt(value);
}

export function encodePackedAssetConfig(packed: PackedAssetConfig): EncodedPackedAssetConfig {
  return { wordA: toWord(packed.wordA), wordB: toWord(packed.wordB) };
}

export function decodePackedAssetConfig(encoded: { wordA: string; wordB: string }): PackedAssetConfig {
  return { wordA: fromWord(encoded.wordA, "wordA"), wordB: fromWord(encoded.wordB, "wordB") };
}
