import path from "node:path";

import { afterEach, describe, expect, it, vi } from "vitest";

import { readConfigFromEnv } from "../src/config";

describe("readConfigFromEnv", () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it("falls back to local defaults", () => {
    for (const name of ["HOST", "PORT", "RPC_URL", "DEPLOYMENTS_DIR", "NETWORK", "LOG_RETENTION_MAX"]) {
      vi.stubEnv(name, "");
    }
    const config = readConfigFromEnv();
    expect(config.host).toBe("127.0.0.1");
    expect(config.port).toBe(3004);
    expect(config.logRetentionMax).toBe(100);
    expect(config.network).toBe("development");
    expect(config.deploymentsDir).toBe(path.resolve(process.cwd(), "deployments"));
  });

  it("reads overrides", () => {
    vi.stubEnv("HOST", "0.0.0.0");
    vi.stubEnv("PORT", "8080");
    vi.stubEnv("RPC_URL", "http://rpc.test:8545");
    vi.stubEnv("NETWORK", "mainnet");
    vi.stubEnv("DEPLOYMENTS_DIR", "/srv/deployments");
    vi.stubEnv("LOG_RETENTION_MAX", "10");

    expect(readConfigFromEnv()).toEqual({
      host: "0.0.0.0",
      port: 8080,
      rpcUrl: "http://rpc.test:8545",
      deploymentsDir: "/srv/deployments",
      network: "mainnet",
      logRetentionMax: 10,
    });
  });

  it("rejects malformed integers", () => {
    vi.stubEnv("PORT", "80.5");
    expect(() => readConfigFromEnv()).toThrow("Invalid PORT: 80.5");
  });
});
