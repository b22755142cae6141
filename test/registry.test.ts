import path from "node:path";

import { describe, expect, it } from "vitest";

import { getConfiguration } from "../src/assets/networkConfiguration";
import { ConfigurationError } from "../src/errors";
import { WrappedTokenPriceFeed } from "../src/feeds/WrappedTokenPriceFeed";
import { FeedRegistry } from "../src/registry";
import { developmentFeeds, REFERENCE_FEED, WRAPPED_TOKEN } from "./helpers";

const deploymentsDir = path.resolve(__dirname, "..", "deployments");

describe("FeedRegistry.build", () => {
  it("registers derived feeds under the address the asset points at", async () => {
    const configuration = await getConfiguration(deploymentsDir, "development");
    const { factory } = developmentFeeds();

    const registry = await FeedRegistry.build(configuration, factory);

    expect(registry.list().map((e) => [e.name, e.kind])).toEqual([
      ["wstETH", "derived"],
      ["base", "primary"],
      ["WETH", "primary"],
    ]);

    const wstEth = configuration.assetConfigs.find((a) => a.name === "wstETH");
    const entry = registry.get(wstEth?.priceFeed ?? "");
    expect(entry?.name).toBe("wstETH");
    expect(entry?.feed).toBeInstanceOf(WrappedTokenPriceFeed);
    expect(await entry?.feed.decimals()).toBe(8);
    expect((await entry?.feed.latestRoundData())?.price).toBe(181818181818n);

    expect(factory.primaryCalls).toEqual([
      REFERENCE_FEED,
      "0x2000000000000000000000000000000000000001",
      "0x2000000000000000000000000000000000000002",
    ]);
    expect(factory.rateCalls).toEqual([{ kind: "stEthPerToken", address: WRAPPED_TOKEN }]);
  });

  it("looks feeds up by name or by address in any case", async () => {
    const configuration = await getConfiguration(deploymentsDir, "development");
    const registry = await FeedRegistry.build(configuration, developmentFeeds().factory);

    expect(registry.get("WETH")?.feed.address).toBe("0x2000000000000000000000000000000000000002");
    expect(registry.get("0x2000000000000000000000000000000000000002")?.name).toBe("WETH");
    expect(registry.get("DAI")).toBeUndefined();
  });

  it("fails construction when a derived feed asks for more decimals than its reference", async () => {
    const configuration = await getConfiguration(deploymentsDir, "development");
    const tooPrecise = {
      ...configuration,
      derivedFeeds: configuration.derivedFeeds.map((d) => ({ ...d, outputDecimals: 19 })),
    };

    await expect(FeedRegistry.build(tooPrecise, developmentFeeds().factory)).rejects.toBeInstanceOf(ConfigurationError);
  });

  it("refuses duplicate feed names", async () => {
    const { weth } = developmentFeeds();
    const registry = new FeedRegistry();
    registry.register({ name: "WETH", kind: "primary", feed: weth });
    expect(() => registry.register({ name: "WETH", kind: "primary", feed: weth })).toThrow(
      new ConfigurationError("Duplicate feed name: WETH"),
    );
  });

  it("reports a derived feed named like a priced asset as a configuration error", async () => {
    const configuration = await getConfiguration(deploymentsDir, "development");
    const clashing = {
      ...configuration,
      derivedFeeds: configuration.derivedFeeds.map((d) => ({ ...d, name: "WETH" })),
    };

    await expect(FeedRegistry.build(clashing, developmentFeeds().factory)).rejects.toThrow(
      new ConfigurationError("Duplicate feed name: WETH"),
    );
  });
});
