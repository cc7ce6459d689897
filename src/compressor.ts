import sharp from "sharp";
import os from "node:os";
import path from "node:path";
import pLimit from "p-limit";
import { planOutput } from "./pathPlanner.js";
import { processFile } from "./pipeline.js";
import { StatsAggregator } from "./stats.js";
import { formatFromExtension } from "./utils.js";
import { DEFAULT_LAYOUT, findImageDirectories, listImageFiles } from "./walker.js";
import type { Codec } from "./codec.js";
import type { CompressionResult, Config, Logger, Report, TreeLayout } from "./types.js";

export interface CompressorOptions {
  concurrency?: number;
  codec?: Codec;
  logger?: Logger;
}

export function defaultConcurrency(): number {
  return Math.max(1, Math.min(os.cpus().length - 1, 4));
}

/**
 * Runs the compression pipeline over a year/subdirectory tree with a bounded
 * number of images in flight at once.
 */
export class ImageCompressor {
  readonly config: Config;
  readonly concurrency: number;
  readonly stats = new StatsAggregator();
  private readonly codec: Codec | undefined;
  private readonly logger: Logger;
  private readonly limit: ReturnType<typeof pLimit>;

  constructor(config: Config, options: CompressorOptions = {}) {
    this.config = config;
    this.concurrency = Math.max(1, Math.floor(options.concurrency ?? defaultConcurrency()));
    this.codec = options.codec;
    this.logger = options.logger ?? console;
    this.limit = pLimit(this.concurrency);

    sharp.cache({ memory: 512 });
  }

  async compressImage(inputPath: string): Promise<CompressionResult> {
    const result = await processFile(inputPath, this.config, {
      codec: this.codec,
      logger: this.logger,
    });
    this.stats.record(result);
    return result;
  }

  /**
   * Compresses every recognized image directly inside `dir`. Images that
   * would write the same output file run one after another in name order;
   * the rest run concurrently. Files not yet started when `signal` aborts
   * are counted as cancelled.
   */
  async compressDirectory(dir: string, signal?: AbortSignal): Promise<CompressionResult[]> {
    const files = await listImageFiles(dir);
    this.logger.log(`Found ${files.length} images in ${dir}`);

    const byOutput = new Map<string, string[]>();
    for (const file of files) {
      const { outputPath } = planOutput(file, formatFromExtension(file), this.config.format, this.config);
      const key = path.resolve(outputPath);
      byOutput.set(key, [...(byOutput.get(key) ?? []), file]);
    }

    for (const [outputPath, group] of byOutput) {
      if (group.length > 1) {
        this.logger.warn(
          `Multiple images write ${outputPath}: ${group.map((file) => path.basename(file)).join(", ")}; ` +
            "processing them one after another, the last one wins"
        );
      }
    }

    const outcomes = await Promise.all(
      [...byOutput.values()].map((group) =>
        this.limit(async () => {
          const results: CompressionResult[] = [];
          for (const file of group) {
            if (signal?.aborted) {
              this.stats.recordCancelled();
              continue;
            }
            results.push(await this.compressImage(file));
          }
          return results;
        })
      )
    );

    return outcomes.flat();
  }

  async processTree(baseDir: string, layout: TreeLayout = DEFAULT_LAYOUT, signal?: AbortSignal): Promise<Report> {
    this.stats.reset();
    this.stats.start();

    const years = await findImageDirectories(baseDir, layout, this.logger);

    for (const { year, imageDirs } of years) {
      if (signal?.aborted) break;

      this.logger.log(`Processing year ${year}...`);
      this.stats.addDirectories(imageDirs.length);

      for (const imageDir of imageDirs) {
        if (signal?.aborted) break;

        this.logger.log(`Processing directory: ${path.basename(imageDir)}`);
        await this.compressDirectory(imageDir, signal);
        if (!signal?.aborted) {
          this.stats.directoryProcessed();
        }
      }
    }

    return this.stats.finalize();
  }
}
