import path from "node:path";
import { extensionFor } from "./utils.js";
import type { Config, OutputPlan, SourceFormat, TargetFormat } from "./types.js";

function withExtension(inputPath: string, ext: string): string {
  const { dir, name } = path.parse(inputPath);
  return path.format({ dir, name, ext });
}

function withSuffix(inputPath: string, suffix: string): string {
  const { dir, name, ext } = path.parse(inputPath);
  return path.format({ dir, name: `${name}${suffix}`, ext });
}

/**
 * Decides where the compressed image goes and what happens to the original.
 *
 * - Format changes: the output takes the target's extension and the original
 *   is deleted when `deleteOriginalOnFormatChange` is set.
 * - Same format with `backupOriginal` and an empty suffix: the original is
 *   renamed to `<input>.bak` before encoding and the output overwrites the
 *   input path.
 * - Same format with `backupOriginal`: the output is written beside the
 *   original as `<stem><outputSuffix><ext>`.
 * - Otherwise the original is overwritten in place.
 *
 * When the format is unchanged the input's own extension spelling is kept
 * (`.jpeg` stays `.jpeg`). Pure: only the arguments decide the plan.
 */
export function planOutput(
  inputPath: string,
  originalFormat: SourceFormat | null,
  targetFormat: TargetFormat,
  config: Config,
): OutputPlan {
  const formatChanged = originalFormat !== targetFormat;

  if (formatChanged) {
    const outputPath = withExtension(inputPath, extensionFor(targetFormat));
    const distinct = path.resolve(outputPath) !== path.resolve(inputPath);
    return {
      outputPath,
      formatChanged,
      shouldBackupOriginal: false,
      backupPath: null,
      shouldDeleteOriginal: config.deleteOriginalOnFormatChange && distinct,
    };
  }

  const inPlace = withExtension(inputPath, path.extname(inputPath));

  if (config.backupOriginal && config.outputSuffix === "") {
    return {
      outputPath: inPlace,
      formatChanged,
      shouldBackupOriginal: true,
      backupPath: `${inputPath}.bak`,
      shouldDeleteOriginal: false,
    };
  }

  if (config.backupOriginal) {
    return {
      outputPath: withSuffix(inputPath, config.outputSuffix),
      formatChanged,
      shouldBackupOriginal: false,
      backupPath: null,
      shouldDeleteOriginal: false,
    };
  }

  return {
    outputPath: inPlace,
    formatChanged,
    shouldBackupOriginal: false,
    backupPath: null,
    shouldDeleteOriginal: false,
  };
}
