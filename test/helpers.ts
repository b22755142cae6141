import { SimplePriceFeed } from "../src/feeds/SimplePriceFeed";
import { StaticExchangeRateSource } from "../src/feeds/exchangeRate";
import type { ExchangeRateSourceKind } from "../src/feeds/exchangeRate";
import type { FeedFactory } from "../src/registry";

export const E18 = 10n ** 18n;
export const T0 = 1_700_000_000n;

export const REFERENCE_FEED = "0x2000000000000000000000000000000000000004";
export const WRAPPED_TOKEN = "0x3000000000000000000000000000000000000003";

/** In-memory feeds keyed by address, standing in for the chain. */
export function memoryFeedFactory(opts: {
  feeds: SimplePriceFeed[];
  rates: StaticExchangeRateSource[];
}): FeedFactory & { primaryCalls: string[]; rateCalls: Array<{ kind: ExchangeRateSourceKind; address: string }> } {
  const primaryCalls: string[] = [];
  const rateCalls: Array<{ kind: ExchangeRateSourceKind; address: string }> = [];
  return {
    primaryCalls,
    rateCalls,
    async primaryFeed(address) {
      primaryCalls.push(address);
      const feed = opts.feeds.find((f) => f.address.toLowerCase() === address.toLowerCase());
      if (!feed) throw new Error(`no feed at ${address}`);
      return feed;
    },
    exchangeRateSource(kind, address) {
      rateCalls.push({ kind, address });
      const source = opts.rates.find((r) => r.address.toLowerCase() === address.toLowerCase());
      if (!source) throw new Error(`no token at ${address}`);
      return source;
    },
  };
}

/** Feeds matching deployments/development. */
export function developmentFeeds() {
  const base = new SimplePriceFeed({ address: "0x2000000000000000000000000000000000000001", decimals: 8, initialPrice: 100_000_000n, now: () => T0 });
  const weth = new SimplePriceFeed({ address: "0x2000000000000000000000000000000000000002", decimals: 8, initialPrice: 200_000_000_000n, now: () => T0 });
  const ethUsd = new SimplePriceFeed({
    address: REFERENCE_FEED,
    decimals: 18,
    description: "ETH / USD",
    initialPrice: 2000n * E18,
    now: () => T0,
  });
  const wstEth = new StaticExchangeRateSource(WRAPPED_TOKEN, 18, 1_100_000_000_000_000_000n);
  return { base, weth, ethUsd, wstEth, factory: memoryFeedFactory({ feeds: [base, weth, ethUsd], rates: [wstEth] }) };
}
