import type http from "node:http";

import bodyParser from "body-parser";
import cors from "cors";
import express, { type Request, type Response } from "express";

import { encodePackedAssetConfig, packAssetConfig } from "./assets/assetConfig";
import type { NamedAssetConfig } from "./assets/networkConfiguration";
import { PriceFeedError, PriceFeedErrorCodes } from "./errors";
import type { Logger } from "./logging";
import type { FeedRegistry, RegisteredFeed } from "./registry";
import type { PriceObservation } from "./types";

export type PriceFeedServerConfig = {
  host: string;
  port: number;
};

export type SerializedObservation = {
  roundId: string;
  price: string;
  startedAt: string;
  updatedAt: string;
  answeredInRound: string;
};

const UINT80_MAX = (1n << 80n) - 1n;

export function serializeObservation(observation: PriceObservation): SerializedObservation {
  return {
    roundId: observation.roundId.toString(),
    price: observation.price.toString(),
    startedAt: observation.startedAt.toString(),
    updatedAt: observation.updatedAt.toString(),
    answeredInRound: observation.answeredInRound.toString(),
  };
}

export function serializeAssetConfig(config: NamedAssetConfig) {
  return {
    name: config.name,
    asset: config.asset,
    priceFeed: config.priceFeed,
    decimals: config.decimals,
    borrowCollateralFactor: config.borrowCollateralFactor.toString(),
    liquidateCollateralFactor: config.liquidateCollateralFactor.toString(),
    liquidationFactor: config.liquidationFactor.toString(),
    supplyCap: config.supplyCap.toString(),
    packed: encodePackedAssetConfig(packAssetConfig(config)),
  };
}

export function httpStatusFor(err: unknown): number {
  if (!(err instanceof PriceFeedError)) return 500;
  switch (err.code) {
    case PriceFeedErrorCodes.InvalidParams:
      return 400;
    case PriceFeedErrorCodes.NoDataPresent:
      return 404;
    case PriceFeedErrorCodes.InvalidMagnitude:
      return 502;
    default:
      return 500;
  }
}

function parseRoundId(raw: string): bigint {
  if (!/^\d+$/.test(raw)) {
    throw new PriceFeedError(`Invalid round id: ${raw}`, PriceFeedErrorCodes.InvalidParams);
  }
  const roundId = BigInt(raw);
  if (roundId > UINT80_MAX) {
    throw new PriceFeedError(`Round id exceeds uint80: ${raw}`, PriceFeedErrorCodes.InvalidParams);
  }
  return roundId;
}

function requestIdOf(req: Request): string | undefined {
  const header = req.headers["x-request-id"];
  return typeof header === "string" ? header : undefined;
}

export class PriceFeedServer {
  private readonly app = express();
  private httpServer?: http.Server;

  constructor(
    readonly config: PriceFeedServerConfig,
    private readonly registry: FeedRegistry,
    private readonly assets: NamedAssetConfig[],
    private readonly logger: Logger,
  ) {
    this.app.use(cors());
    this.app.use(bodyParser.json());

    this._mountRoutes();
  }

  async start(): Promise<{ url: string; port: number }> {
    const server = await new Promise<http.Server>((resolve, reject) => {
      const listening = this.app.listen(this.config.port, this.config.host, () => {
        listening.off("error", reject);
        resolve(listening);
      });
      listening.once("error", reject);
    });
    this.httpServer = server;

    const addr = server.address();
    const port = typeof addr === "object" && addr ? addr.port : this.config.port;
    const url = `http://${this.config.host}:${port}`;
    this.logger.log({ level: "info", msg: "price feed server listening", meta: { url } });
    return { url, port };
  }

  async stop(): Promise<void> {
    const server = this.httpServer;
    if (!server) return;
    this.httpServer = undefined;
    await new Promise<void>((resolve, reject) => server.close((err) => (err ? reject(err) : resolve())));
  }

  private _fail(req: Request, res: Response, err: unknown, feed?: string): void {
    const status = httpStatusFor(err);
    const error = err instanceof Error ? err.message : String(err);
    const code = err instanceof PriceFeedError ? err.code : undefined;
    this.logger.requestFailed({ requestId: requestIdOf(req), feed, status, error, code });
    res.status(status).json({ error, code });
  }

  private _feed(req: Request, res: Response): RegisteredFeed | undefined {
    const entry = this.registry.get(String(req.params.id));
    if (!entry) {
      res.status(404).json({ error: "unknown feed" });
    }
    return entry;
  }

  private async _observe(req: Request, res: Response, roundId?: string): Promise<void> {
    const entry = this._feed(req, res);
    if (!entry) return;
    try {
      const observation =
        roundId === undefined
          ? await entry.feed.latestRoundData()
          : await entry.feed.getRoundData(parseRoundId(roundId));
      this.logger.priceServed({
        requestId: requestIdOf(req),
        feed: entry.name,
        roundId: observation.roundId,
        price: observation.price,
      });
      res.json({ feed: entry.name, decimals: await entry.feed.decimals(), ...serializeObservation(observation) });
    } catch (err) {
      this._fail(req, res, err, entry.name);
    }
  }

  private _mountRoutes(): void {
    this.app.get("/health", (_req, res) => {
      res.json({ ok: true, feeds: this.registry.list().length, assets: this.assets.length });
    });

    this.app.get("/feeds", async (req, res) => {
      try {
        const feeds = await Promise.all(
          this.registry.list().map(async (entry) => ({
            name: entry.name,
            kind: entry.kind,
            address: entry.feed.address,
            decimals: await entry.feed.decimals(),
            description: await entry.feed.description(),
          })),
        );
        res.json({ feeds });
      } catch (err) {
        this._fail(req, res, err);
      }
    });

    this.app.get("/feeds/:id", async (req, res) => {
      const entry = this._feed(req, res);
      if (!entry) return;
      try {
        const [decimals, description, version] = await Promise.all([
          entry.feed.decimals(),
          entry.feed.description(),
          entry.feed.version(),
        ]);
        res.json({
          name: entry.name,
          kind: entry.kind,
          address: entry.feed.address,
          decimals,
          description,
          version: version.toString(),
        });
      } catch (err) {
        this._fail(req, res, err, entry.name);
      }
    });

    this.app.get("/feeds/:id/latest", (req, res) => void this._observe(req, res));

    this.app.get("/feeds/:id/rounds/:roundId", (req, res) => void this._observe(req, res, String(req.params.roundId)));

    this.app.get("/assets", (req, res) => {
      try {
        res.json({ assets: this.assets.map(serializeAssetConfig) });
      } catch (err) {
        this._fail(req, res, err);
      }
    });

    this.app.get("/api/logs", (_req, res) => {
      res.json(this.logger.recentLogs());
    });
  }
}
