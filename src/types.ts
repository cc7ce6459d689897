export type TargetFormat = "JPEG" | "PNG" | "WEBP" | "TIFF" | "GIF";

export type SourceFormat = TargetFormat | "BMP";

export interface Config {
  readonly quality: number;
  readonly format: TargetFormat;
  readonly maxWidth?: number;
  readonly maxHeight?: number;
  readonly optimize: boolean;
  readonly progressive: boolean;
  readonly backupOriginal: boolean;
  readonly outputSuffix: string;
  readonly deleteOriginalOnFormatChange: boolean;
}

export type Channels = 1 | 2 | 3 | 4;

export type ColorMode = "L" | "LA" | "RGB" | "RGBA" | "P";

export interface RasterImage {
  data: Buffer;
  width: number;
  height: number;
  channels: Channels;
  colorMode: ColorMode;
  hasAlpha: boolean;
  /** Palette size of the source, kept so PNG output can stay palette-based. */
  paletteColours?: number;
}

export type EncodeParams =
  | { format: "JPEG"; quality: number; progressive: boolean; optimize: boolean }
  | { format: "PNG"; optimize: true }
  | { format: "WEBP"; quality: number; method: number }
  | { format: "TIFF" | "GIF"; optimize: boolean };

export interface FileTask {
  inputPath: string;
  originalFormat: SourceFormat | null;
  originalSizeBytes: number;
}

export interface OutputPlan {
  readonly outputPath: string;
  readonly formatChanged: boolean;
  readonly shouldBackupOriginal: boolean;
  readonly backupPath: string | null;
  readonly shouldDeleteOriginal: boolean;
}

export type ErrorKind = "NotFound" | "DecodeError" | "EncodeError" | "FilesystemError" | "Unknown";

export type CompressionResult =
  | {
      success: true;
      inputPath: string;
      outputPath: string;
      formatChanged: boolean;
      originalSizeBytes: number;
      compressedSizeBytes: number;
    }
  | {
      success: false;
      inputPath: string;
      errorKind: ErrorKind;
      error: string;
      originalSizeBytes: number;
    };

export interface FailedFile {
  file: string;
  kind: ErrorKind;
  error: string;
}

export interface Stats {
  processed: number;
  errors: number;
  cancelled: number;
  totalOriginalBytes: number;
  totalCompressedBytes: number;
  totalDirectories: number;
  processedDirectories: number;
  failed: FailedFile[];
  startTime: number | null;
  endTime: number | null;
}

export interface Report {
  processed: number;
  errors: number;
  cancelled: number;
  totalDirectories: number;
  processedDirectories: number;
  totalOriginalBytes: number;
  totalCompressedBytes: number;
  originalMB: number;
  compressedMB: number;
  savedMB: number;
  reductionPercent: number;
  duration: string;
  failed: FailedFile[];
}

export interface TreeLayout {
  startYear: number;
  endYear: number;
  yearPrefix: string;
  dirSuffix: string;
}

export type Logger = Pick<Console, "log" | "warn" | "error">;

export interface ParsedArgs {
  baseDir?: string;
  configFile: string;
  init: boolean;
  layout: TreeLayout;
  concurrency?: number;
  help: boolean;
  version: boolean;
}
