import fs from "node:fs/promises";
import { z } from "zod";
import { ConfigError, UnsupportedFormatError, errorMessage, isErrnoException } from "./errors.js";
import type { Config, TargetFormat } from "./types.js";

export const DEFAULT_CONFIG_FILE = "compression_config.json";

export const TARGET_FORMATS: readonly TargetFormat[] = ["JPEG", "PNG", "WEBP", "TIFF", "GIF"];

const FORMAT_ALIASES: Record<string, TargetFormat> = {
  JPG: "JPEG",
  TIF: "TIFF",
};

const configSchema = z.object({
  quality: z.number().int().min(1).max(100).default(85),
  format: z.string().min(1).default("JPEG"),
  maxWidth: z.number().int().positive().optional(),
  maxHeight: z.number().int().positive().optional(),
  optimize: z.boolean().default(true),
  progressive: z.boolean().default(true),
  backupOriginal: z.boolean().default(false),
  outputSuffix: z.string().default("_compressed"),
  deleteOriginalOnFormatChange: z.boolean().default(true),
});

/** Options accepted by {@link createConfig}; anything left out takes its default. */
export type ConfigInput = z.input<typeof configSchema>;

// On-disk shape, snake_case keys
const configFileSchema = z
  .object({
    quality: z.number().optional(),
    format: z.string().optional(),
    max_width: z.number().nullable().optional(),
    max_height: z.number().nullable().optional(),
    optimize: z.boolean().optional(),
    progressive: z.boolean().optional(),
    backup_original: z.boolean().optional(),
    output_suffix: z.string().optional(),
    delete_original_on_format_change: z.boolean().optional(),
  })
  .strict();

type ConfigFile = z.infer<typeof configFileSchema>;

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
    .join("; ");
}

export function parseFormat(name: string): TargetFormat {
  const upper = name.trim().toUpperCase();
  const aliased = FORMAT_ALIASES[upper];
  if (aliased) return aliased;

  const format = TARGET_FORMATS.find((f) => f === upper);
  if (!format) {
    throw new UnsupportedFormatError(name);
  }
  return format;
}

/**
 * Builds a frozen {@link Config}. Throws `UnsupportedFormatError` for an
 * unknown target format and `ConfigError` for any other invalid value.
 */
export function createConfig(input: ConfigInput = {}): Config {
  const parsed = configSchema.safeParse(input);
  if (!parsed.success) {
    throw new ConfigError(`Invalid configuration: ${formatIssues(parsed.error)}`);
  }

  const { format, ...rest } = parsed.data;
  return Object.freeze({ ...rest, format: parseFormat(format) });
}

export const DEFAULT_CONFIG: Config = createConfig();

function fromFile(data: ConfigFile): ConfigInput {
  return {
    quality: data.quality,
    format: data.format,
    maxWidth: data.max_width ?? undefined,
    maxHeight: data.max_height ?? undefined,
    optimize: data.optimize,
    progressive: data.progressive,
    backupOriginal: data.backup_original,
    outputSuffix: data.output_suffix,
    deleteOriginalOnFormatChange: data.delete_original_on_format_change,
  };
}

function toFile(config: Config): Required<ConfigFile> {
  return {
    quality: config.quality,
    format: config.format,
    max_width: config.maxWidth ?? null,
    max_height: config.maxHeight ?? null,
    optimize: config.optimize,
    progressive: config.progressive,
    backup_original: config.backupOriginal,
    output_suffix: config.outputSuffix,
    delete_original_on_format_change: config.deleteOriginalOnFormatChange,
  };
}

/**
 * Reads a JSON config file. A missing file yields the defaults; a file that
 * cannot be parsed or fails validation is a `ConfigError`.
 */
export async function loadConfig(configFile: string): Promise<Config> {
  let raw: string;
  try {
    raw = await fs.readFile(configFile, "utf-8");
  } catch (err) {
    if (isErrnoException(err) && err.code === "ENOENT") {
      return DEFAULT_CONFIG;
    }
    throw new ConfigError(`Could not read config file ${configFile}: ${errorMessage(err)}`, { cause: err });
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch (err) {
    throw new ConfigError(`Config file ${configFile} is not valid JSON: ${errorMessage(err)}`, { cause: err });
  }

  const parsed = configFileSchema.safeParse(json);
  if (!parsed.success) {
    throw new ConfigError(`Invalid config file ${configFile}: ${formatIssues(parsed.error)}`);
  }

  return createConfig(fromFile(parsed.data));
}

export async function saveConfig(configFile: string, config: Config): Promise<void> {
  await fs.writeFile(configFile, JSON.stringify(toFile(config), null, 2) + "\n", "utf-8");
}

export async function saveDefaultConfig(configFile: string = DEFAULT_CONFIG_FILE): Promise<void> {
  await saveConfig(configFile, DEFAULT_CONFIG);
}

export function describeConfig(config: Config): string[] {
  const resize =
    config.maxWidth !== undefined || config.maxHeight !== undefined
      ? `${config.maxWidth ?? "any"}x${config.maxHeight ?? "any"}`
      : "no";

  return [
    `Quality: ${config.quality}`,
    `Format: ${config.format}`,
    `Resize: ${resize}`,
    `Backup original: ${config.backupOriginal}`,
    `Output suffix: ${config.outputSuffix}`,
    `Delete original on format change: ${config.deleteOriginalOnFormatChange}`,
  ];
}

export function configWarnings(config: Config): string[] {
  const warnings: string[] = [];
  if (config.backupOriginal && config.deleteOriginalOnFormatChange) {
    warnings.push(
      "backup_original does not apply to files whose format changes: " +
        "their originals are deleted because delete_original_on_format_change is set"
    );
  }
  return warnings;
}
