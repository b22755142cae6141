import path from "node:path";

export type PriceFeedServiceConfig = {
  host: string;
  port: number;
  rpcUrl: string;
  deploymentsDir: string;
  network: string;
  logRetentionMax: number;
};

function parseIntEnv(name: string, fallback: number): number {
  const raw = process.env[name];
  if (!raw) return fallback;
  const parsed = Number(raw);
  if (!Number.isInteger(parsed) || parsed < 0) throw new Error(`Invalid ${name}: ${raw}`);
  return parsed;
}

export function readConfigFromEnv(): PriceFeedServiceConfig {
  const host = process.env.HOST || "127.0.0.1";
  const port = parseIntEnv("PORT", 3004);
  const rpcUrl = process.env.RPC_URL || "http://127.0.0.1:8545";

  const deploymentsDir = process.env.DEPLOYMENTS_DIR || path.resolve(process.cwd(), "deployments");
  const network = process.env.NETWORK || "development";

  const logRetentionMax = parseIntEnv("LOG_RETENTION_MAX", 100);

  return { host, port, rpcUrl, deploymentsDir, network, logRetentionMax };
}
