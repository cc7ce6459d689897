import { formatDuration, toMegabytes } from "./utils.js";
import type { CompressionResult, Report, Stats } from "./types.js";

function emptyStats(): Stats {
  return {
    processed: 0,
    errors: 0,
    cancelled: 0,
    totalOriginalBytes: 0,
    totalCompressedBytes: 0,
    totalDirectories: 0,
    processedDirectories: 0,
    failed: [],
    startTime: null,
    endTime: null,
  };
}

/**
 * Accumulates pipeline outcomes for a run. Every mutation is a synchronous
 * method, so completions interleaving on the event loop cannot lose updates.
 */
export class StatsAggregator {
  private stats: Stats = emptyStats();

  reset(): void {
    this.stats = emptyStats();
  }

  start(now = Date.now()): void {
    this.stats.startTime = now;
  }

  record(result: CompressionResult): void {
    this.stats.totalOriginalBytes += result.originalSizeBytes;

    if (result.success) {
      this.stats.processed++;
      this.stats.totalCompressedBytes += result.compressedSizeBytes;
      return;
    }

    this.stats.errors++;
    this.stats.failed.push({
      file: result.inputPath,
      kind: result.errorKind,
      error: result.error,
    });
  }

  recordCancelled(): void {
    this.stats.cancelled++;
  }

  addDirectories(count: number): void {
    this.stats.totalDirectories += count;
  }

  directoryProcessed(): void {
    this.stats.processedDirectories++;
  }

  snapshot(): Readonly<Stats> {
    return { ...this.stats, failed: [...this.stats.failed] };
  }

  finalize(now = Date.now()): Report {
    this.stats.endTime = now;
    const { totalOriginalBytes, totalCompressedBytes } = this.stats;

    const reductionPercent = totalOriginalBytes > 0
      ? (1 - totalCompressedBytes / totalOriginalBytes) * 100
      : 0;

    const { startTime, endTime } = this.stats;
    const duration = startTime !== null && endTime !== null
      ? formatDuration(endTime - startTime)
      : "0s";

    const originalMB = toMegabytes(totalOriginalBytes);
    const compressedMB = toMegabytes(totalCompressedBytes);

    return {
      processed: this.stats.processed,
      errors: this.stats.errors,
      cancelled: this.stats.cancelled,
      totalDirectories: this.stats.totalDirectories,
      processedDirectories: this.stats.processedDirectories,
      totalOriginalBytes,
      totalCompressedBytes,
      originalMB,
      compressedMB,
      savedMB: originalMB - compressedMB,
      reductionPercent,
      duration,
      failed: [...this.stats.failed],
    };
  }
}
