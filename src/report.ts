import { formatBytes, formatCount } from "./utils.js";
import type { Report } from "./types.js";

const RULE = "=".repeat(50);

export function formatReport(report: Report): string {
  const lines = [
    "",
    RULE,
    "COMPRESSION STATISTICS",
    RULE,
    `Images processed:      ${formatCount(report.processed)}`,
    `Errors:                ${formatCount(report.errors)}`,
    `Directories processed: ${formatCount(report.processedDirectories)}`,
    `Total directories:     ${formatCount(report.totalDirectories)}`,
  ];

  if (report.cancelled > 0) {
    lines.push(`Cancelled:             ${formatCount(report.cancelled)}`);
  }

  if (report.totalOriginalBytes > 0) {
    lines.push(
      `Original size:         ${formatCount(report.totalOriginalBytes)} bytes (${report.originalMB.toFixed(2)} MB)`,
      `Compressed size:       ${formatCount(report.totalCompressedBytes)} bytes (${report.compressedMB.toFixed(2)} MB)`,
      `Total reduction:       ${report.reductionPercent.toFixed(1)}%`,
      `Space saved:           ${report.savedMB.toFixed(2)} MB`,
    );
  }

  lines.push(`Duration:              ${report.duration}`, RULE);

  if (report.failed.length > 0) {
    lines.push("", "Failed images:");
    for (const f of report.failed) {
      lines.push(`  - ${f.file} [${f.kind}]: ${f.error}`);
    }
  }

  return lines.join("\n");
}

export function summarizeSavings(report: Report): string {
  const saved = Math.max(0, report.totalOriginalBytes - report.totalCompressedBytes);
  return `Saved ${formatBytes(saved)} across ${formatCount(report.processed)} images`;
}
