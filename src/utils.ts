import path from "node:path";
import type { SourceFormat, TargetFormat } from "./types.js";

export const IMAGE_EXTENSIONS = [".png", ".jpg", ".jpeg", ".bmp", ".tiff", ".webp"];

const EXTENSION_FORMATS: Record<string, SourceFormat> = {
  ".png": "PNG",
  ".jpg": "JPEG",
  ".jpeg": "JPEG",
  ".bmp": "BMP",
  ".tif": "TIFF",
  ".tiff": "TIFF",
  ".webp": "WEBP",
  ".gif": "GIF",
};

const FORMAT_EXTENSIONS: Record<TargetFormat, string> = {
  JPEG: ".jpg",
  PNG: ".png",
  WEBP: ".webp",
  TIFF: ".tiff",
  GIF: ".gif",
};

export function isImageFile(filePath: string): boolean {
  const ext = path.extname(filePath).toLowerCase();
  return IMAGE_EXTENSIONS.includes(ext);
}

export function formatFromExtension(filePath: string): SourceFormat | null {
  const ext = path.extname(filePath).toLowerCase();
  return EXTENSION_FORMATS[ext] ?? null;
}

export function extensionFor(format: TargetFormat): string {
  return FORMAT_EXTENSIONS[format];
}

export function formatBytes(bytes: number): string {
  const units = ["B", "KB", "MB", "GB"];
  let size = bytes;
  let unit = 0;

  while (size >= 1024 && unit < units.length - 1) {
    size /= 1024;
    unit++;
  }

  return `${size.toFixed(2)} ${units[unit]}`;
}

export function toMegabytes(bytes: number): number {
  return bytes / (1024 * 1024);
}

export function formatCount(n: number): string {
  return n.toLocaleString("en-US");
}

export function formatDuration(ms: number): string {
  const seconds = Math.floor(ms / 1000);
  const minutes = Math.floor(seconds / 60);
  return minutes > 0 ? `${minutes}m ${seconds % 60}s` : `${seconds}s`;
}
