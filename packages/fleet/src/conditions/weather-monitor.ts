/**
 * Background weather poller.
 *
 * Keeps the last good report and serves it synchronously so planning never
 * waits on the weather service. A failed poll is logged and the previous
 * report stays in place.
 */

import type { WeatherReport } from "@skyroute/types";
import { describeError, withTimeout } from "@skyroute/routing";

/** Fetches a fresh report from wherever weather comes from */
export interface WeatherFetcher {
  fetchLatest(): Promise<WeatherReport>;
}

/** Last known weather, read without waiting */
export interface WeatherProvider {
  getLatest(): WeatherReport | null;
}

export interface WeatherMonitorOptions {
  /** Milliseconds between polls (default 10 000) */
  pollIntervalMs?: number;
  /** Upper bound on one fetch (default 2000) */
  timeoutMs?: number;
}

export class WeatherMonitor implements WeatherProvider {
  private latest: WeatherReport | null = null;
  private interval: ReturnType<typeof setInterval> | undefined;
  private inFlight: Promise<WeatherReport | null> | undefined;
  private readonly pollIntervalMs: number;
  private readonly timeoutMs: number;

  constructor(
    private readonly fetcher: WeatherFetcher,
    options: WeatherMonitorOptions = {},
  ) {
    this.pollIntervalMs = options.pollIntervalMs ?? 10_000;
    this.timeoutMs = options.timeoutMs ?? 2000;
  }

  getLatest(): WeatherReport | null {
    return this.latest;
  }

  isRunning(): boolean {
    return this.interval !== undefined;
  }

  /** Poll now, then every interval */
  start(): void {
    if (this.interval !== undefined) return;
    console.log(`[weather] Polling every ${this.pollIntervalMs / 1000}s`);
    this.interval = setInterval(() => {
      void this.refresh();
    }, this.pollIntervalMs);
    void this.refresh();
  }

  async stop(): Promise<void> {
    if (this.interval !== undefined) {
      clearInterval(this.interval);
      this.interval = undefined;
    }
    await this.inFlight;
  }

  /**
   * Fetch once. Concurrent calls share one fetch. Never rejects; returns the
   * report in effect afterwards.
   */
  refresh(): Promise<WeatherReport | null> {
    if (!this.inFlight) {
      this.inFlight = this.poll().finally(() => {
        this.inFlight = undefined;
      });
    }
    return this.inFlight;
  }

  private async poll(): Promise<WeatherReport | null> {
    try {
      const report = await withTimeout("weather", () => this.fetcher.fetchLatest(), this.timeoutMs);
      if (this.latest?.category !== report.category) {
        console.log(`[weather] Conditions now ${report.category}`);
      }
      this.latest = report;
    } catch (err) {
      console.warn(`[weather] Refresh failed, keeping ${this.latest?.category ?? "no report"}: ${describeError(err)}`);
    }
    return this.latest;
  }
}
