/**
 * Rolling Window Totals
 *
 * Bytes transferred per direction over a trailing window, derived from the
 * monotonic interface counters. Each recorded sample keeps the bytes moved
 * since the previous one; totals shrink only when samples age out.
 */

import type { RollingTotals } from '../types/index.js';

interface WindowEntry {
  timestamp: number;
  uploadBytes: number;
  downloadBytes: number;
}

export class RollingWindowTotals {
  private readonly windowMs: number;
  private entries: WindowEntry[] = [];
  private lastUploadCounter?: number;
  private lastDownloadCounter?: number;
  private uploadSum = 0;
  private downloadSum = 0;

  constructor(windowMs: number) {
    this.windowMs = windowMs;
  }

  /**
   * Records the cumulative counters seen at `timestamp`. A counter that went
   * backwards (interface reset) contributes nothing for that step. An unknown
   * counter contributes nothing and leaves the previous anchor in place.
   */
  record(
    timestamp: number,
    cumulativeUploadBytes: number | undefined,
    cumulativeDownloadBytes: number | undefined,
  ): void {
    const uploadBytes = deltaOf(this.lastUploadCounter, cumulativeUploadBytes);
    const downloadBytes = deltaOf(this.lastDownloadCounter, cumulativeDownloadBytes);

    if (cumulativeUploadBytes !== undefined) {
      this.lastUploadCounter = cumulativeUploadBytes;
    }
    if (cumulativeDownloadBytes !== undefined) {
      this.lastDownloadCounter = cumulativeDownloadBytes;
    }

    this.entries.push({ timestamp, uploadBytes, downloadBytes });
    this.uploadSum += uploadBytes;
    this.downloadSum += downloadBytes;

    this.evict(timestamp);
  }

  /**
   * Totals inside the window ending at `now`
   */
  getTotals(now: number): RollingTotals {
    this.evict(now);
    return {
      uploadBytes: this.uploadSum,
      downloadBytes: this.downloadSum,
    };
  }

  size(): number {
    return this.entries.length;
  }

  private evict(now: number): void {
    const cutoff = now - this.windowMs;
    let drop = 0;
    while (drop < this.entries.length && this.entries[drop].timestamp < cutoff) {
      this.uploadSum -= this.entries[drop].uploadBytes;
      this.downloadSum -= this.entries[drop].downloadBytes;
      drop += 1;
    }
    if (drop > 0) {
      this.entries = this.entries.slice(drop);
    }
    if (this.entries.length === 0) {
      // Re-anchor to avoid floating point residue once the window is empty
      this.uploadSum = 0;
      this.downloadSum = 0;
    }
  }
}

function deltaOf(previous: number | undefined, current: number | undefined): number {
  if (previous === undefined || current === undefined || current <= previous) {
    return 0;
  }
  return current - previous;
}
