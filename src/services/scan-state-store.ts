/**
 * Scan State Store
 *
 * Remembers the last signal seen for each instrument so a scan can tell a
 * new signal from one it already reported, and keeps a per-instrument log
 * of every scan.
 */

import type { MarketSentiment, SignalState } from "../analysis/types";

export interface ScanLogEntry {
  ticker: string;
  signal: SignalState;
  /** Market sentiment the scan ran under, when one was known */
  sentiment?: MarketSentiment;
  alerts: string[];
  scannedAt: Date;
}

export interface ScanStateStore {
  /** Undefined for an instrument that was never scanned */
  getLastSignal(ticker: string): Promise<SignalState | undefined>;
  setLastSignal(ticker: string, signal: SignalState): Promise<void>;
  appendScanLog(entries: readonly ScanLogEntry[]): Promise<void>;
}

/**
 * Map-backed store, also the stand-in used by tests
 */
export class InMemoryScanStateStore implements ScanStateStore {
  private readonly lastSignals: Map<string, SignalState> = new Map();
  private readonly log: ScanLogEntry[] = [];

  public async getLastSignal(ticker: string): Promise<SignalState | undefined> {
    return this.lastSignals.get(ticker);
  }

  public async setLastSignal(ticker: string, signal: SignalState): Promise<void> {
    this.lastSignals.set(ticker, signal);
  }

  public async appendScanLog(entries: readonly ScanLogEntry[]): Promise<void> {
    for (const entry of entries) {
      this.log.push({ ...entry, alerts: [...entry.alerts] });
    }
  }

  /**
   * Logged scans, oldest first, optionally for one ticker
   */
  public history(ticker?: string): ScanLogEntry[] {
    return this.log
      .filter((entry) => ticker === undefined || entry.ticker === ticker)
      .map((entry) => ({ ...entry, alerts: [...entry.alerts] }));
  }
}
