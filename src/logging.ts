import Debug, { type Debugger } from "debug";

export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogEvent = {
  ts: number;
  level: LogLevel;
  service: string;
  msg: string;
  requestId?: string;
  feed?: string;
  roundId?: string;
  meta?: Record<string, unknown>;
};

export type LoggerOptions = {
  service: string;
  retentionMax?: number;
  stdout?: boolean; // print JSON lines; off in tests
};

export class Logger {
  private readonly debug: Debugger;
  private readonly retentionMax: number;
  private readonly stdout: boolean;
  private readonly recent: LogEvent[] = [];

  constructor(readonly opts: LoggerOptions) {
    this.debug = Debug(`wrapped-price-feed:${opts.service}`);
    this.retentionMax = opts.retentionMax ?? 100;
    this.stdout = opts.stdout ?? true;
  }

  log(event: Omit<LogEvent, "ts" | "service"> & { ts?: number }): LogEvent {
    const full: LogEvent = {
      ts: event.ts ?? Math.floor(Date.now() / 1000),
      level: event.level,
      service: this.opts.service,
      msg: event.msg,
      requestId: event.requestId,
      feed: event.feed,
      roundId: event.roundId,
      meta: event.meta ?? {},
    };

    this.debug("%s %s", full.level, full.msg);
    if (this.stdout) {
      // eslint-disable-next-line no-console
      console.log(JSON.stringify(full));
    }

    this.recent.push(full);
    if (this.recent.length > this.retentionMax) this.recent.shift();
    return full;
  }

  /** Newest first. */
  recentLogs(): LogEvent[] {
    return [...this.recent].reverse();
  }

  priceServed(args: { requestId?: string; feed: string; roundId: bigint; price: bigint }): LogEvent {
    return this.log({
      level: "info",
      msg: "price served",
      requestId: args.requestId,
      feed: args.feed,
      roundId: args.roundId.toString(),
      meta: { price: args.price.toString() },
    });
  }

  requestFailed(args: { requestId?: string; feed?: string; status: number; error: string; code?: number }): LogEvent {
    return this.log({
      level: args.status >= 500 ? "error" : "warn",
      msg: "request failed",
      requestId: args.requestId,
      feed: args.feed,
      meta: { status: args.status, error: args.error, code: args.code },
    });
  }
}
