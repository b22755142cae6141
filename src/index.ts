import { ethers } from "ethers";

import { getConfiguration, type ProtocolConfiguration } from "./assets/networkConfiguration";
import type { PriceFeedServiceConfig } from "./config";
import { Logger } from "./logging";
import { FeedRegistry, onChainFeedFactory, type FeedFactory } from "./registry";
import { PriceFeedServer } from "./server";

export async function loadRegistry(
  config: Pick<PriceFeedServiceConfig, "rpcUrl" | "deploymentsDir" | "network">,
  factory?: FeedFactory,
): Promise<{ configuration: ProtocolConfiguration; registry: FeedRegistry }> {
  const configuration = await getConfiguration(config.deploymentsDir, config.network);
  const registry = await FeedRegistry.build(
    configuration,
    factory ?? onChainFeedFactory(new ethers.providers.JsonRpcProvider(config.rpcUrl)),
  );
  return { configuration, registry };
}

export async function startPriceFeedService(
  config: PriceFeedServiceConfig,
  factory?: FeedFactory,
): Promise<PriceFeedServer> {
  const logger = new Logger({ service: "server", retentionMax: config.logRetentionMax });
  const { configuration, registry } = await loadRegistry(config, factory);
  const server = new PriceFeedServer(config, registry, configuration.assetConfigs, logger);
  await server.start();
  return server;
}

export * from "./types";
export * from "./errors";
export { INT256_MAX, UINT256_MAX, pow10, signed256 } from "./math";
export type { ExchangeRateSource, PriceFeed } from "./feeds/PriceFeed";
export { SimplePriceFeed } from "./feeds/SimplePriceFeed";
export { ChainlinkPriceFeed } from "./feeds/ChainlinkPriceFeed";
export {
  Erc4626ExchangeRateSource,
  StaticExchangeRateSource,
  StEthPerTokenSource,
  connectExchangeRateSource,
} from "./feeds/exchangeRate";
export { WrappedTokenPriceFeed, deriveWrappedPrice } from "./feeds/WrappedTokenPriceFeed";
export {
  FACTOR_SCALE,
  decodePackedAssetConfig,
  encodePackedAssetConfig,
  packAssetConfig,
  unpackAssetConfig,
  validateAssetConfig,
} from "./assets/assetConfig";
export { getConfiguration, hasNetworkConfiguration } from "./assets/networkConfiguration";
export { FeedRegistry, onChainFeedFactory } from "./registry";
export { Logger } from "./logging";
export { PriceFeedServer };
