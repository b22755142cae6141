import fs from "node:fs/promises";
import path from "node:path";

import { ethers } from "ethers";

import { ConfigurationError } from "../errors";
import type { ExchangeRateSourceKind } from "../feeds/exchangeRate";
import type { AssetConfig } from "../types";
import { packAssetConfig } from "./assetConfig";

export type ContractMap = Record<string, string>;

export interface NetworkRateConfiguration {
  kink: number;
  slopeLow: number;
  slopeHigh: number;
  base: number;
}

export interface NetworkTrackingConfiguration {
  indexScale: number;
  baseSupplySpeed: number;
  baseBorrowSpeed: number;
  baseMinForRewards: number;
}

export interface NetworkAssetConfiguration {
  priceFeed: string;
  decimals: number;
  borrowCF: number;
  liquidateCF: number;
  liquidationFactor: number;
  supplyCap: number; // whole tokens
}

export interface NetworkDerivedFeedConfiguration {
  address: string;
  referenceFeed: string;
  wrappedToken: string;
  rateSource: ExchangeRateSourceKind;
  outputDecimals: number;
  description?: string;
}

export interface NetworkConfiguration {
  governor: string;
  pauseGuardian: string;
  baseToken: string;
  baseTokenPriceFeed: string;
  reserveRate: number;
  borrowMin: number;
  targetReserves: number;
  rates: NetworkRateConfiguration;
  tracking: NetworkTrackingConfiguration;
  assets: Record<string, NetworkAssetConfiguration>;
  derivedFeeds: Record<string, NetworkDerivedFeedConfiguration>;
}

export type InterestRateInfo = {
  kink: bigint;
  perYearInterestRateSlopeLow: bigint;
  perYearInterestRateSlopeHigh: bigint;
  perYearInterestRateBase: bigint;
};

export type TrackingInfo = {
  trackingIndexScale: bigint;
  baseTrackingSupplySpeed: bigint;
  baseTrackingBorrowSpeed: bigint;
  baseMinForRewards: bigint;
};

export type DerivedFeedDeclaration = {
  name: string;
  address: string;
  referenceFeed: string;
  wrappedToken: string;
  rateSource: ExchangeRateSourceKind;
  outputDecimals: number;
  description?: string;
};

export type NamedAssetConfig = AssetConfig & { name: string };

export type ProtocolConfiguration = InterestRateInfo &
  TrackingInfo & {
    network: string;
    governor: string;
    pauseGuardian: string;
    baseToken: string;
    baseTokenPriceFeed: string;
    reserveRate: bigint;
    baseBorrowMin: bigint;
    targetReserves: bigint;
    assetConfigs: NamedAssetConfig[];
    derivedFeeds: DerivedFeedDeclaration[];
  };

// Deployed token names that differ from the symbol used in configuration files.
const CONTRACT_NAME_REMAP: Record<string, string> = {
  USDC: "FiatTokenProxy",
  "WBTC.e": "BridgeToken",
};

const ADDRESS_REGEX = /^0x[a-fA-F0-9]{40}$/;

function isAddress(a: string): boolean {
  return ADDRESS_REGEX.test(a);
}

export function address(a: string): string {
  if (!isAddress(a)) {
    throw new ConfigurationError(`expected address, got \`${a}\``);
  }
  return ethers.utils.getAddress(a.toLowerCase());
}

const EXPONENT_FORM = /^(-?)(\d+)(?:\.(\d+))?e([+-]\d+)$/i;

/** Shortest decimal rendering of `n`, with any exponent expanded into plain digits. */
function decimalString(n: number, what: string): string {
  if (!Number.isFinite(n)) throw new ConfigurationError(`${what} is not a finite number [received=${n}]`);
  const s = String(n);
  const match = EXPONENT_FORM.exec(s);
  if (!match) return s;

  const [, sign, whole, fraction = "", exponent] = match;
  const digits = whole + fraction;
  const point = whole.length + Number(exponent);
  if (point <= 0) return `${sign}0.${"0".repeat(-point)}${digits}`;
  if (point >= digits.length) return `${sign}${digits}${"0".repeat(point - digits.length)}`;
  return `${sign}${digits.slice(0, point)}.${digits.slice(point)}`;
}

/** Parses a decimal amount exactly into an integer with the given number of decimals. */
export function units(n: number, decimals: number, what = "value"): bigint {
  const s = decimalString(n, what);
  try {
    return ethers.utils.parseUnits(s, decimals).toBigInt();
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ConfigurationError(`${what} cannot be expressed with ${decimals} decimals [received=${s}]: ${reason}`);
  }
}

export function number(n: number, what = "value"): bigint {
  if (!Number.isFinite(n)) throw new ConfigurationError(`${what} is not a finite number [received=${n}]`);
  return BigInt(Math.floor(n));
}

export function percentage(n: number, what = "percentage"): bigint {
  if (!Number.isFinite(n)) {
    throw new ConfigurationError(`${what} is not a finite number [received=${n}]`);
  } else if (n > 1.0) {
    throw new ConfigurationError(`${what} greater than 100% [received=${n}]`);
  } else if (n < 0) {
    throw new ConfigurationError(`${what} less than 0% [received=${n}]`);
  }
  return units(n, 18, what);
}

export function getContractAddress(contractName: string, contractMap: ContractMap): string {
  const contract = contractMap[contractName];
  if (contract !== undefined) return address(contract);

  const remapped = CONTRACT_NAME_REMAP[contractName];
  if (remapped !== undefined) return getContractAddress(remapped, contractMap);

  throw new ConfigurationError(
    `Cannot find contract \`${contractName}\` in contract map with keys \`${Object.keys(contractMap).join(", ")}\``,
  );
}

function resolveAddress(nameOrAddress: string, contractMap: ContractMap): string {
  return isAddress(nameOrAddress) ? address(nameOrAddress) : getContractAddress(nameOrAddress, contractMap);
}

// JSON shape checks.

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function requireRecord(obj: Record<string, unknown>, key: string, where: string): Record<string, unknown> {
  const v = obj[key];
  if (!isRecord(v)) throw new ConfigurationError(`${where}.${key} must be an object`);
  return v;
}

function requireString(obj: Record<string, unknown>, key: string, where: string): string {
  const v = obj[key];
  if (typeof v !== "string" || v.length === 0) throw new ConfigurationError(`${where}.${key} must be a non-empty string`);
  return v;
}

function requireNumber(obj: Record<string, unknown>, key: string, where: string): number {
  const v = obj[key];
  if (typeof v !== "number" || !Number.isFinite(v)) throw new ConfigurationError(`${where}.${key} must be a number`);
  return v;
}

function optionalString(obj: Record<string, unknown>, key: string, where: string): string | undefined {
  if (obj[key] === undefined) return undefined;
  return requireString(obj, key, where);
}

function requireRateSource(obj: Record<string, unknown>, key: string, where: string): ExchangeRateSourceKind {
  const v = obj[key];
  if (v === "stEthPerToken" || v === "erc4626") return v;
  throw new ConfigurationError(`${where}.${key} must be "stEthPerToken" or "erc4626"`);
}

function mapRecord<T>(
  obj: Record<string, unknown>,
  where: string,
  parse: (entry: Record<string, unknown>, where: string) => T,
): Record<string, T> {
  const out: Record<string, T> = {};
  for (const [name, entry] of Object.entries(obj)) {
    if (!isRecord(entry)) throw new ConfigurationError(`${where}.${name} must be an object`);
    out[name] = parse(entry, `${where}.${name}`);
  }
  return out;
}

export function parseNetworkConfiguration(raw: unknown): NetworkConfiguration {
  if (!isRecord(raw)) throw new ConfigurationError("configuration must be a JSON object");
  const where = "configuration";

  const rates = requireRecord(raw, "rates", where);
  const tracking = requireRecord(raw, "tracking", where);
  const derivedFeeds = raw.derivedFeeds === undefined ? {} : requireRecord(raw, "derivedFeeds", where);

  return {
    governor: requireString(raw, "governor", where),
    pauseGuardian: requireString(raw, "pauseGuardian", where),
    baseToken: requireString(raw, "baseToken", where),
    baseTokenPriceFeed: requireString(raw, "baseTokenPriceFeed", where),
    reserveRate: requireNumber(raw, "reserveRate", where),
    borrowMin: requireNumber(raw, "borrowMin", where),
    targetReserves: requireNumber(raw, "targetReserves", where),
    rates: {
      kink: requireNumber(rates, "kink", `${where}.rates`),
      slopeLow: requireNumber(rates, "slopeLow", `${where}.rates`),
      slopeHigh: requireNumber(rates, "slopeHigh", `${where}.rates`),
      base: requireNumber(rates, "base", `${where}.rates`),
    },
    tracking: {
      indexScale: requireNumber(tracking, "indexScale", `${where}.tracking`),
      baseSupplySpeed: requireNumber(tracking, "baseSupplySpeed", `${where}.tracking`),
      baseBorrowSpeed: requireNumber(tracking, "baseBorrowSpeed", `${where}.tracking`),
      baseMinForRewards: requireNumber(tracking, "baseMinForRewards", `${where}.tracking`),
    },
    assets: mapRecord(requireRecord(raw, "assets", where), `${where}.assets`, (entry, at) => ({
      priceFeed: requireString(entry, "priceFeed", at),
      decimals: requireNumber(entry, "decimals", at),
      borrowCF: requireNumber(entry, "borrowCF", at),
      liquidateCF: requireNumber(entry, "liquidateCF", at),
      liquidationFactor: requireNumber(entry, "liquidationFactor", at),
      supplyCap: requireNumber(entry, "supplyCap", at),
    })),
    derivedFeeds: mapRecord(derivedFeeds, `${where}.derivedFeeds`, (entry, at) => ({
      address: requireString(entry, "address", at),
      referenceFeed: requireString(entry, "referenceFeed", at),
      wrappedToken: requireString(entry, "wrappedToken", at),
      rateSource: requireRateSource(entry, "rateSource", at),
      outputDecimals: requireNumber(entry, "outputDecimals", at),
      description: optionalString(entry, "description", at),
    })),
  };
}

export function parseContractMap(raw: unknown): ContractMap {
  if (!isRecord(raw)) throw new ConfigurationError("addresses must be a JSON object");
  const out: ContractMap = {};
  for (const [name, value] of Object.entries(raw)) {
    if (typeof value !== "string") throw new ConfigurationError(`addresses.${name} must be a string`);
    out[name] = value;
  }
  return out;
}

function getInterestRateInfo(rates: NetworkRateConfiguration): InterestRateInfo {
  return {
    kink: percentage(rates.kink, "rates.kink"),
    perYearInterestRateSlopeLow: percentage(rates.slopeLow, "rates.slopeLow"),
    // The high slope is a rate, not a fraction, and routinely exceeds 100%.
    perYearInterestRateSlopeHigh: units(rates.slopeHigh, 18, "rates.slopeHigh"),
    perYearInterestRateBase: percentage(rates.base, "rates.base"),
  };
}

function getTrackingInfo(tracking: NetworkTrackingConfiguration): TrackingInfo {
  return {
    trackingIndexScale: number(tracking.indexScale, "tracking.indexScale"),
    baseTrackingSupplySpeed: number(tracking.baseSupplySpeed, "tracking.baseSupplySpeed"),
    baseTrackingBorrowSpeed: number(tracking.baseBorrowSpeed, "tracking.baseBorrowSpeed"),
    baseMinForRewards: number(tracking.baseMinForRewards, "tracking.baseMinForRewards"),
  };
}

export function getAssetConfigs(
  assets: Record<string, NetworkAssetConfiguration>,
  contractMap: ContractMap,
): NamedAssetConfig[] {
  return Object.entries(assets).map(([name, assetConfig]) => {
    const { decimals } = assetConfig;
    if (!Number.isInteger(decimals) || decimals < 0 || decimals > 255) {
      throw new ConfigurationError(`${name}.decimals out of range [0, 255] [received=${decimals}]`);
    }
    const config: NamedAssetConfig = {
      name,
      asset: getContractAddress(name, contractMap),
      priceFeed: address(assetConfig.priceFeed),
      decimals,
      borrowCollateralFactor: percentage(assetConfig.borrowCF, `${name}.borrowCF`),
      liquidateCollateralFactor: percentage(assetConfig.liquidateCF, `${name}.liquidateCF`),
      liquidationFactor: percentage(assetConfig.liquidationFactor, `${name}.liquidationFactor`),
      supplyCap: units(assetConfig.supplyCap, decimals, `${name}.supplyCap`),
    };
    // Anything the storage layout cannot hold fails here rather than at registration.
    packAssetConfig(config);
    return config;
  });
}

function getDerivedFeeds(
  derivedFeeds: Record<string, NetworkDerivedFeedConfiguration>,
  contractMap: ContractMap,
): DerivedFeedDeclaration[] {
  return Object.entries(derivedFeeds).map(([name, feed]) => ({
    name,
    address: address(feed.address),
    referenceFeed: resolveAddress(feed.referenceFeed, contractMap),
    wrappedToken: resolveAddress(feed.wrappedToken, contractMap),
    rateSource: feed.rateSource,
    outputDecimals: feed.outputDecimals,
    description: feed.description,
  }));
}

export function getNetworkDirectory(deploymentsDir: string, network: string): string {
  return path.join(deploymentsDir, network);
}

async function fileExists(p: string): Promise<boolean> {
  try {
    await fs.access(p);
    return true;
  } catch {
    return false;
  }
}

async function readJson(p: string): Promise<unknown> {
  const raw = await fs.readFile(p, "utf8");
  try {
    return JSON.parse(raw);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new ConfigurationError(`Invalid JSON in ${p}: ${reason}`);
  }
}

export async function hasNetworkConfiguration(deploymentsDir: string, network: string): Promise<boolean> {
  return fileExists(path.join(getNetworkDirectory(deploymentsDir, network), "configuration.json"));
}

export async function loadNetworkConfiguration(deploymentsDir: string, network: string): Promise<NetworkConfiguration> {
  const file = path.join(getNetworkDirectory(deploymentsDir, network), "configuration.json");
  return parseNetworkConfiguration(await readJson(file));
}

export async function loadContractMap(deploymentsDir: string, network: string): Promise<ContractMap> {
  const file = path.join(getNetworkDirectory(deploymentsDir, network), "addresses.json");
  if (!(await fileExists(file))) return {};
  return parseContractMap(await readJson(file));
}

export function buildProtocolConfiguration(
  network: string,
  networkConfiguration: NetworkConfiguration,
  contractMap: ContractMap,
): ProtocolConfiguration {
  return {
    network,
    governor: address(networkConfiguration.governor),
    pauseGuardian: address(networkConfiguration.pauseGuardian),
    baseToken: resolveAddress(networkConfiguration.baseToken, contractMap),
    baseTokenPriceFeed: address(networkConfiguration.baseTokenPriceFeed),
    ...getInterestRateInfo(networkConfiguration.rates),
    reserveRate: percentage(networkConfiguration.reserveRate, "reserveRate"),
    ...getTrackingInfo(networkConfiguration.tracking),
    baseBorrowMin: number(networkConfiguration.borrowMin, "borrowMin"),
    targetReserves: number(networkConfiguration.targetReserves, "targetReserves"),
    assetConfigs: getAssetConfigs(networkConfiguration.assets, contractMap),
    derivedFeeds: getDerivedFeeds(networkConfiguration.derivedFeeds, contractMap),
  };
}

export async function getConfiguration(deploymentsDir: string, network: string): Promise<ProtocolConfiguration> {
  const [networkConfiguration, contractMap] = await Promise.all([
    loadNetworkConfiguration(deploymentsDir, network),
    loadContractMap(deploymentsDir, network),
  ]);
  return buildProtocolConfiguration(network, networkConfiguration, contractMap);
}
