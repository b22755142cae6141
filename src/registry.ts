import type { ethers } from "ethers";

import type { DerivedFeedDeclaration, ProtocolConfiguration } from "./assets/networkConfiguration";
import { ConfigurationError } from "./errors";
import { ChainlinkPriceFeed } from "./feeds/ChainlinkPriceFeed";
import { connectExchangeRateSource, type ExchangeRateSourceKind } from "./feeds/exchangeRate";
import type { ExchangeRateSource, PriceFeed } from "./feeds/PriceFeed";
import { WrappedTokenPriceFeed } from "./feeds/WrappedTokenPriceFeed";

/** Where primary feeds and exchange-rate sources come from. */
export interface FeedFactory {
  primaryFeed(address: string): Promise<PriceFeed>;
  exchangeRateSource(kind: ExchangeRateSourceKind, address: string): ExchangeRateSource;
}

export function onChainFeedFactory(provider: ethers.providers.Provider): FeedFactory {
  return {
    primaryFeed: (address) => ChainlinkPriceFeed.connect(address, provider),
    exchangeRateSource: (kind, address) => connectExchangeRateSource(kind, address, provider),
  };
}

export type RegisteredFeed = {
  name: string;
  kind: "primary" | "derived";
  feed: PriceFeed;
};

/**
 * Feeds for one network, addressable by name or by address. Every asset's `priceFeed`
 * resolves here, whether it points at an aggregator or at a derived feed.
 */
export class FeedRegistry {
  private readonly byName = new Map<string, RegisteredFeed>();
  private readonly byAddress = new Map<string, RegisteredFeed>();

  register(entry: RegisteredFeed): void {
    if (this.byName.has(entry.name)) throw new ConfigurationError(`Duplicate feed name: ${entry.name}`);
    this.byName.set(entry.name, entry);
    const key = entry.feed.address.toLowerCase();
    if (!this.byAddress.has(key)) this.byAddress.set(key, entry);
  }

  get(nameOrAddress: string): RegisteredFeed | undefined {
    return this.byName.get(nameOrAddress) ?? this.byAddress.get(nameOrAddress.toLowerCase());
  }

  list(): RegisteredFeed[] {
    return [...this.byName.values()];
  }

  static async build(configuration: ProtocolConfiguration, factory: FeedFactory): Promise<FeedRegistry> {
    const registry = new FeedRegistry();
    const primaries = new Map<string, Promise<PriceFeed>>();
    const primary = (address: string): Promise<PriceFeed> => {
      const key = address.toLowerCase();
      let feed = primaries.get(key);
      if (!feed) {
        feed = factory.primaryFeed(address);
        primaries.set(key, feed);
      }
      return feed;
    };

    const derivedAddresses = new Set<string>();
    for (const declaration of configuration.derivedFeeds) {
      registry.register({
        name: declaration.name,
        kind: "derived",
        feed: await buildDerivedFeed(declaration, primary, factory),
      });
      derivedAddresses.add(declaration.address.toLowerCase());
    }

    registry.register({ name: "base", kind: "primary", feed: await primary(configuration.baseTokenPriceFeed) });

    for (const asset of configuration.assetConfigs) {
      if (derivedAddresses.has(asset.priceFeed.toLowerCase())) continue;
      registry.register({ name: asset.name, kind: "primary", feed: await primary(asset.priceFeed) });
    }

    return registry;
  }
}

async function buildDerivedFeed(
  declaration: DerivedFeedDeclaration,
  primary: (address: string) => Promise<PriceFeed>,
  factory: FeedFactory,
): Promise<WrappedTokenPriceFeed> {
  const reference = await primary(declaration.referenceFeed);
  const token = factory.exchangeRateSource(declaration.rateSource, declaration.wrappedToken);
  return WrappedTokenPriceFeed.create(reference, token, {
    address: declaration.address,
    outputDecimals: declaration.outputDecimals,
    description: declaration.description,
  });
}
