import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import sharp from "sharp";
import fs from "node:fs/promises";
import path from "node:path";
import os from "node:os";
import { ImageCompressor } from "../compressor.js";
import { sharpCodec, type Codec } from "../codec.js";
import { createConfig } from "../config.js";
import { findImageDirectories, listImageFiles } from "../walker.js";
import type { Logger, TreeLayout } from "../types.js";

function tmpDir(): string {
  return path.join(os.tmpdir(), `imgshrink-test-${Date.now()}-${Math.random().toString(36).slice(2)}`);
}

async function createTestPng(filePath: string, width = 12, height = 8): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await sharp({
    create: { width, height, channels: 4, background: { r: 0, g: 120, b: 255, alpha: 0.5 } },
  })
    .png()
    .toFile(filePath);
}

function silentLogger(): Logger {
  return { log: vi.fn(), warn: vi.fn(), error: vi.fn() };
}

const layout: TreeLayout = {
  startYear: 2020,
  endYear: 2022,
  yearPrefix: "enem-",
  dirSuffix: "-images",
};

describe("walker", () => {
  let workDir: string;

  beforeEach(async () => {
    workDir = tmpDir();
    await fs.mkdir(workDir, { recursive: true });
  });

  afterEach(async () => {
    await fs.rm(workDir, { recursive: true, force: true });
  });

  it("lists recognized images case-insensitively, files only, sorted", async () => {
    await fs.writeFile(path.join(workDir, "a.jpg"), "x");
    await fs.writeFile(path.join(workDir, "B.PNG"), "x");
    await fs.writeFile(path.join(workDir, "c.txt"), "x");
    await fs.writeFile(path.join(workDir, "d.jpg.bak"), "x");
    await fs.mkdir(path.join(workDir, "e.png"));

    expect(await listImageFiles(workDir)).toEqual([path.join(workDir, "B.PNG"), path.join(workDir, "a.jpg")]);
  });

  it("finds suffixed subdirectories per year and skips missing years", async () => {
    await fs.mkdir(path.join(workDir, "enem-2020", "q2-images"), { recursive: true });
    await fs.mkdir(path.join(workDir, "enem-2020", "q1-images"), { recursive: true });
    await fs.mkdir(path.join(workDir, "enem-2020", "answers"), { recursive: true });
    await fs.mkdir(path.join(workDir, "enem-2021"), { recursive: true });
    const logger = silentLogger();

    const years = await findImageDirectories(workDir, layout, logger);

    expect(years).toEqual([
      {
        year: 2020,
        yearDir: path.join(workDir, "enem-2020"),
        imageDirs: [path.join(workDir, "enem-2020", "q1-images"), path.join(workDir, "enem-2020", "q2-images")],
      },
      { year: 2021, yearDir: path.join(workDir, "enem-2021"), imageDirs: [] },
    ]);
    expect(logger.warn).toHaveBeenCalledWith(
      `Directory for year 2022 not found: ${path.join(workDir, "enem-2022")}`
    );
  });

  it("fails when the base directory is missing", async () => {
    await expect(findImageDirectories(path.join(workDir, "nope"), layout, silentLogger())).rejects.toThrow(
      "Base directory not found"
    );
  });
});

describe("ImageCompressor", () => {
  let workDir: string;

  beforeEach(async () => {
    workDir = tmpDir();
    await fs.mkdir(workDir, { recursive: true });
  });

  afterEach(async () => {
    await fs.rm(workDir, { recursive: true, force: true });
  });

  it("processes a year tree and keeps going past a bad file", async () => {
    const q1 = path.join(workDir, "enem-2020", "q1-images");
    const x = path.join(workDir, "enem-2021", "x-images");
    await createTestPng(path.join(q1, "a.png"));
    await createTestPng(path.join(q1, "b.png"));
    await fs.writeFile(path.join(q1, "notes.txt"), "not an image");
    await createTestPng(path.join(x, "c.png"));
    await fs.writeFile(path.join(x, "broken.png"), "not a real image");

    const compressor = new ImageCompressor(createConfig(), { concurrency: 2, logger: silentLogger() });
    const report = await compressor.processTree(workDir, layout);

    expect(report.processed).toBe(3);
    expect(report.errors).toBe(1);
    expect(report.cancelled).toBe(0);
    expect(report.totalDirectories).toBe(2);
    expect(report.processedDirectories).toBe(2);
    expect(report.failed).toEqual([
      { file: path.join(x, "broken.png"), kind: "DecodeError", error: expect.any(String) },
    ]);
    expect((await fs.readdir(q1)).sort()).toEqual(["a.jpg", "b.jpg", "notes.txt"]);
    expect((await fs.readdir(x)).sort()).toEqual(["broken.png", "c.jpg"]);
  });

  it("sums exactly the bytes each completion wrote", async () => {
    const dir = path.join(workDir, "enem-2020", "q1-images");
    for (let i = 0; i < 6; i++) {
      await createTestPng(path.join(dir, `img${i}.png`), 10 + i * 5, 10 + i * 3);
    }

    const compressor = new ImageCompressor(createConfig({ format: "WEBP" }), { concurrency: 3, logger: silentLogger() });
    const results = await compressor.compressDirectory(dir);

    const written = results.reduce((sum, r) => sum + (r.success ? r.compressedSizeBytes : 0), 0);
    const snapshot = compressor.stats.snapshot();
    expect(results).toHaveLength(6);
    expect(snapshot.processed).toBe(6);
    expect(snapshot.errors).toBe(0);
    expect(snapshot.totalCompressedBytes).toBe(written);
  });

  it("stops starting new images once aborted", async () => {
    const dir = path.join(workDir, "enem-2020", "q1-images");
    await createTestPng(path.join(dir, "a.png"));
    await createTestPng(path.join(dir, "b.png"));
    await createTestPng(path.join(dir, "c.png"));
    await createTestPng(path.join(workDir, "enem-2021", "q1-images", "d.png"));

    const controller = new AbortController();
    const abortingCodec: Codec = {
      decode: async (inputPath) => {
        controller.abort();
        return sharpCodec.decode(inputPath);
      },
      encode: sharpCodec.encode,
    };

    const compressor = new ImageCompressor(createConfig(), {
      concurrency: 1,
      codec: abortingCodec,
      logger: silentLogger(),
    });
    const report = await compressor.processTree(workDir, layout, controller.signal);

    expect(report.processed).toBe(1);
    expect(report.cancelled).toBe(2);
    expect(report.processedDirectories).toBe(0);
    expect((await fs.readdir(dir)).sort()).toEqual(["a.jpg", "b.png", "c.png"]);
  });

  it("runs images that share an output path one after another", async () => {
    const dir = path.join(workDir, "enem-2020", "q1-images");
    await fs.mkdir(dir, { recursive: true });
    await sharp({ create: { width: 10, height: 10, channels: 3, background: { r: 10, g: 10, b: 10 } } })
      .jpeg()
      .toFile(path.join(dir, "photo.jpg"));
    await createTestPng(path.join(dir, "photo.png"), 20, 10);
    await createTestPng(path.join(dir, "other.png"));
    const logger = silentLogger();

    const compressor = new ImageCompressor(createConfig(), { concurrency: 3, logger });
    const results = await compressor.compressDirectory(dir);

    expect(results).toHaveLength(3);
    expect(results.every((r) => r.success)).toBe(true);
    expect(logger.warn).toHaveBeenCalledWith(
      `Multiple images write ${path.resolve(dir, "photo.jpg")}: photo.jpg, photo.png; ` +
        "processing them one after another, the last one wins"
    );
    expect((await fs.readdir(dir)).sort()).toEqual(["other.jpg", "photo.jpg"]);
    const metadata = await sharp(path.join(dir, "photo.jpg")).metadata();
    expect(metadata.width).toBe(20);
    expect(metadata.height).toBe(10);
  });

  it("uses at least one worker", () => {
    const compressor = new ImageCompressor(createConfig(), { concurrency: 0 });
    expect(compressor.concurrency).toBe(1);
  });
});
