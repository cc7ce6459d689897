import path from "node:path";
import fs from "node:fs/promises";
import { sharpCodec, type Codec } from "./codec.js";
import { CompressionError, errorMessage, isErrnoException } from "./errors.js";
import { planOutput } from "./pathPlanner.js";
import { transformImage } from "./transformer.js";
import { extensionFor, formatCount, formatFromExtension } from "./utils.js";
import type { CompressionResult, Config, ErrorKind, FileTask, Logger } from "./types.js";

export interface PipelineOptions {
  codec?: Codec;
  logger?: Logger;
}

async function step<T>(kind: ErrorKind, action: () => Promise<T>): Promise<T> {
  try {
    return await action();
  } catch (err) {
    if (err instanceof CompressionError) throw err;
    throw new CompressionError(kind, errorMessage(err), { cause: err });
  }
}

async function pathExists(filePath: string): Promise<boolean> {
  return fs
    .access(filePath)
    .then(() => true)
    .catch(() => false);
}

async function createTask(inputPath: string): Promise<FileTask> {
  try {
    const stat = await fs.stat(inputPath);
    if (!stat.isFile()) {
      throw new CompressionError("NotFound", `Not a regular file: ${inputPath}`);
    }
    return {
      inputPath,
      originalFormat: formatFromExtension(inputPath),
      originalSizeBytes: stat.size,
    };
  } catch (err) {
    if (err instanceof CompressionError) throw err;
    if (isErrnoException(err) && err.code === "ENOENT") {
      throw new CompressionError("NotFound", `File not found: ${inputPath}`, { cause: err });
    }
    throw new CompressionError("FilesystemError", errorMessage(err), { cause: err });
  }
}

/**
 * Compresses one image: decode, transform, plan, encode, then apply the
 * plan's rename/delete. Always resolves; failures come back as a result
 * carrying the error kind.
 *
 * A planned `.bak` rename happens before the encode and is not rolled back
 * if the encode fails, leaving the original under its `.bak` name.
 */
export async function processFile(
  inputPath: string,
  config: Config,
  options: PipelineOptions = {},
): Promise<CompressionResult> {
  const codec = options.codec ?? sharpCodec;
  const logger = options.logger ?? console;
  let originalSizeBytes = 0;

  try {
    const task = await createTask(inputPath);
    originalSizeBytes = task.originalSizeBytes;

    const decoded = await step("DecodeError", () => codec.decode(inputPath));
    const { image, params } = await step("Unknown", () => transformImage(decoded, config));
    const plan = planOutput(inputPath, task.originalFormat, config.format, config);

    if (plan.backupPath !== null) {
      const backupPath = plan.backupPath;
      await step("FilesystemError", () => fs.rename(inputPath, backupPath));
    }

    const compressedSizeBytes = await step("EncodeError", () => codec.encode(image, plan.outputPath, params));

    if (
      plan.shouldDeleteOriginal &&
      path.resolve(inputPath) !== path.resolve(plan.outputPath) &&
      (await pathExists(inputPath))
    ) {
      await step("FilesystemError", () => fs.unlink(inputPath));
      logger.log(`Deleted original: ${path.basename(inputPath)} (converted to ${extensionFor(config.format)})`);
    }

    const ratio = originalSizeBytes > 0 ? (1 - compressedSizeBytes / originalSizeBytes) * 100 : 0;
    const formatInfo = plan.formatChanged
      ? ` [${path.extname(inputPath).toLowerCase()} -> ${path.extname(plan.outputPath)}]`
      : "";
    logger.log(
      `Compressed: ${path.basename(inputPath)} -> ${path.basename(plan.outputPath)}${formatInfo} ` +
        `(${formatCount(originalSizeBytes)} -> ${formatCount(compressedSizeBytes)} bytes, ${ratio.toFixed(1)}% reduction)`
    );

    return {
      success: true,
      inputPath,
      outputPath: plan.outputPath,
      formatChanged: plan.formatChanged,
      originalSizeBytes,
      compressedSizeBytes,
    };
  } catch (err) {
    const kind = err instanceof CompressionError ? err.kind : "Unknown";
    const message = errorMessage(err);

    if (kind === "NotFound") {
      logger.warn(`File not found: ${inputPath}`);
    } else {
      logger.error(`Failed to compress ${inputPath} (${kind}): ${message}`);
    }

    return { success: false, inputPath, errorKind: kind, error: message, originalSizeBytes };
  }
}
