#!/usr/bin/env node
import { Command } from "commander";

import { serializeAssetConfig, serializeObservation } from "./server";
import { getConfiguration } from "./assets/networkConfiguration";
import { readConfigFromEnv } from "./config";
import { loadRegistry, startPriceFeedService } from "./index";

type NetworkOpts = { network?: string; deployments?: string };

function resolveConfig(opts: NetworkOpts) {
  const config = readConfigFromEnv();
  return {
    ...config,
    network: opts.network ?? config.network,
    deploymentsDir: opts.deployments ?? config.deploymentsDir,
  };
}

async function main(): Promise<void> {
  const program = new Command();
  program.name("wrapped-price-feed");

  program
    .command("serve")
    .description("Serve every configured feed over HTTP")
    .option("--network <name>", "Network under the deployments directory")
    .option("--deployments <dir>", "Deployments directory")
    .action(async (opts: NetworkOpts) => {
      const config = resolveConfig(opts);
      const server = await startPriceFeedService(config);

      const shutdown = async () => {
        await server.stop();
        process.exit(0);
      };
      process.on("SIGINT", () => void shutdown());
      process.on("SIGTERM", () => void shutdown());
    });

  program
    .command("price <feed>")
    .description("Print the latest (or a given round's) observation of a feed, by name or address")
    .option("--round <id>", "Round id")
    .option("--network <name>", "Network under the deployments directory")
    .option("--deployments <dir>", "Deployments directory")
    .action(async (feed: string, opts: NetworkOpts & { round?: string }) => {
      const { registry } = await loadRegistry(resolveConfig(opts));
      const entry = registry.get(feed);
      if (!entry) throw new Error(`Unknown feed: ${feed}`);
      const observation =
        opts.round === undefined
          ? await entry.feed.latestRoundData()
          : await entry.feed.getRoundData(BigInt(opts.round));
      // eslint-disable-next-line no-console
      console.log(JSON.stringify({ feed: entry.name, decimals: await entry.feed.decimals(), ...serializeObservation(observation) }, null, 2));
    });

  program
    .command("pack-assets")
    .description("Validate the network's asset configuration and print its packed storage words")
    .option("--network <name>", "Network under the deployments directory")
    .option("--deployments <dir>", "Deployments directory")
    .action(async (opts: NetworkOpts) => {
      const config = resolveConfig(opts);
      const configuration = await getConfiguration(config.deploymentsDir, config.network);
      // eslint-disable-next-line no-console
      console.log(JSON.stringify(configuration.assetConfigs.map(serializeAssetConfig), null, 2));
    });

  await program.parseAsync(process.argv);
}

void main().catch((err) => {
  // eslint-disable-next-line no-console
  console.error(err);
  process.exit(1);
});
