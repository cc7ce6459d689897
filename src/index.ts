#!/usr/bin/env node

import fs from "node:fs";
import { createRequire } from "node:module";
import { ImageCompressor } from "./compressor.js";
import {
  DEFAULT_CONFIG_FILE,
  configWarnings,
  describeConfig,
  loadConfig,
  saveDefaultConfig,
} from "./config.js";
import { formatReport, summarizeSavings } from "./report.js";
import { DEFAULT_LAYOUT } from "./walker.js";
import type { ParsedArgs } from "./types.js";

const require = createRequire(import.meta.url);
const { version: VERSION } = require("../package.json") as { version: string };

const HELP = `
imgshrink v${VERSION} — Recompress images in a year/subdirectory tree

Usage:
  imgshrink <baseDir>                 Compress <baseDir>/<prefix><year>/*<suffix>/ images
  imgshrink -c my.json <baseDir>      Use a specific config file
  imgshrink --init                    Write the default config file and exit

Options:
  -c, --config <file>    Config file (default: ${DEFAULT_CONFIG_FILE}, created if missing)
      --init             Write the default config file and exit
      --from <year>      First year to process (default: ${DEFAULT_LAYOUT.startYear})
      --to <year>        Last year to process (default: ${DEFAULT_LAYOUT.endYear})
      --year-prefix <s>  Year directory prefix (default: ${DEFAULT_LAYOUT.yearPrefix})
      --dir-suffix <s>   Image directory suffix (default: ${DEFAULT_LAYOUT.dirSuffix})
  -j, --concurrency <n>  Images processed in parallel (default: CPUs - 1, max 4)
  -h, --help             Show this help message
  -v, --version          Show version number

Recognized images: png, jpg, jpeg, bmp, tiff, webp
`.trim();

function fail(message: string): never {
  console.error(`Error: ${message}`);
  console.error("Run imgshrink --help for usage");
  process.exit(1);
}

function requireValue(args: string[], i: number, flag: string): string {
  const next = args[i];
  if (next === undefined) {
    fail(`${flag} requires an argument`);
  }
  return next;
}

function parseInteger(value: string, flag: string): number {
  const val = parseInt(value, 10);
  if (isNaN(val)) {
    fail(`invalid ${flag} value: ${value}`);
  }
  return val;
}

function parseArgs(argv: string[]): ParsedArgs {
  const args = argv.slice(2);
  const result: ParsedArgs = {
    configFile: DEFAULT_CONFIG_FILE,
    init: false,
    layout: { ...DEFAULT_LAYOUT },
    help: false,
    version: false,
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (arg === "-h" || arg === "--help") {
      result.help = true;
      return result;
    }

    if (arg === "-v" || arg === "--version") {
      result.version = true;
      return result;
    }

    if (arg === "--init") {
      result.init = true;
      continue;
    }

    if (arg === "-c" || arg === "--config") {
      result.configFile = requireValue(args, ++i, arg);
      continue;
    }

    if (arg === "--from") {
      result.layout.startYear = parseInteger(requireValue(args, ++i, arg), arg);
      continue;
    }

    if (arg === "--to") {
      result.layout.endYear = parseInteger(requireValue(args, ++i, arg), arg);
      continue;
    }

    if (arg === "--year-prefix") {
      result.layout.yearPrefix = requireValue(args, ++i, arg);
      continue;
    }

    if (arg === "--dir-suffix") {
      result.layout.dirSuffix = requireValue(args, ++i, arg);
      continue;
    }

    if (arg === "-j" || arg === "--concurrency") {
      const val = parseInteger(requireValue(args, ++i, arg), arg);
      if (val < 1) {
        fail(`${arg} must be at least 1`);
      }
      result.concurrency = val;
      continue;
    }

    if (arg.startsWith("-")) {
      fail(`unknown option: ${arg}`);
    }

    if (result.baseDir !== undefined) {
      fail(`unexpected argument: ${arg}`);
    }
    result.baseDir = arg;
  }

  return result;
}

async function main(): Promise<void> {
  const parsed = parseArgs(process.argv);

  if (parsed.help) {
    console.log(HELP);
    return;
  }

  if (parsed.version) {
    console.log(VERSION);
    return;
  }

  if (parsed.init) {
    await saveDefaultConfig(parsed.configFile);
    console.log(`Default configuration saved to: ${parsed.configFile}`);
    return;
  }

  if (parsed.baseDir === undefined) {
    fail("no base directory specified");
  }

  if (!fs.existsSync(parsed.configFile)) {
    await saveDefaultConfig(parsed.configFile);
    console.log(`Default configuration saved to: ${parsed.configFile}`);
  }

  const config = await loadConfig(parsed.configFile);

  console.log("\nSettings:");
  describeConfig(config).forEach((line) => console.log(`  - ${line}`));
  configWarnings(config).forEach((warning) => console.warn(`Warning: ${warning}`));

  const controller = new AbortController();
  process.once("SIGINT", () => {
    console.warn("\nInterrupted: finishing images in progress...");
    controller.abort();
  });

  const compressor = new ImageCompressor(config, { concurrency: parsed.concurrency });

  console.log("\nStarting...");
  const report = await compressor.processTree(parsed.baseDir, parsed.layout, controller.signal);

  console.log(formatReport(report));
  console.log(summarizeSavings(report));

  if (report.errors > 0 || controller.signal.aborted) {
    process.exit(1);
  }
}

main().catch((err) => {
  console.error("Error:", err instanceof Error ? err.message : String(err));
  process.exit(1);
});
