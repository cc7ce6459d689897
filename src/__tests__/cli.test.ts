import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { execFile } from "node:child_process";
import { promisify } from "node:util";
import fs from "node:fs/promises";
import path from "node:path";
import os from "node:os";
import sharp from "sharp";

const exec = promisify(execFile);

// Use tsx to run the TypeScript source directly
const CLI = path.resolve("src/index.ts");
const TSX = path.resolve("node_modules/.bin/tsx");

function tmpDir(): string {
  return path.join(os.tmpdir(), `imgshrink-cli-test-${Date.now()}-${Math.random().toString(36).slice(2)}`);
}

async function createTestPng(filePath: string): Promise<void> {
  await fs.mkdir(path.dirname(filePath), { recursive: true });
  await sharp({
    create: { width: 10, height: 10, channels: 3, background: { r: 255, g: 0, b: 0 } },
  })
    .png()
    .toFile(filePath);
}

describe("CLI", () => {
  let workDir: string;

  beforeEach(async () => {
    workDir = tmpDir();
    await fs.mkdir(workDir, { recursive: true });
  });

  afterEach(async () => {
    await fs.rm(workDir, { recursive: true, force: true });
  });

  it("prints help with --help", async () => {
    const { stdout } = await exec(TSX, [CLI, "--help"]);
    expect(stdout).toContain("imgshrink");
    expect(stdout).toContain("Usage:");
    expect(stdout).toContain("--config");
  });

  it("prints version with --version", async () => {
    const { stdout } = await exec(TSX, [CLI, "--version"]);
    expect(stdout.trim()).toMatch(/^\d+\.\d+\.\d+$/);
  });

  it("exits with error on no arguments", async () => {
    try {
      await exec(TSX, [CLI]);
      expect.fail("should have thrown");
    } catch (err: unknown) {
      const error = err as { code: number; stderr: string };
      expect(error.code).toBe(1);
      expect(error.stderr).toContain("no base directory");
    }
  });

  it("exits with error on unknown flag", async () => {
    try {
      await exec(TSX, [CLI, "--badopt"]);
      expect.fail("should have thrown");
    } catch (err: unknown) {
      const error = err as { code: number; stderr: string };
      expect(error.code).toBe(1);
      expect(error.stderr).toContain("unknown option");
    }
  });

  it("writes the default config with --init", async () => {
    const configFile = path.join(workDir, "settings.json");

    const { stdout } = await exec(TSX, [CLI, "--init", "-c", configFile]);
    expect(stdout).toContain(`Default configuration saved to: ${configFile}`);

    const written = JSON.parse(await fs.readFile(configFile, "utf-8")) as Record<string, unknown>;
    expect(written.quality).toBe(85);
    expect(written.format).toBe("JPEG");
  });

  it("compresses a year tree and prints the report", async () => {
    const configFile = path.join(workDir, "settings.json");
    await fs.writeFile(configFile, JSON.stringify({ format: "webp", quality: 80 }));
    const imageDir = path.join(workDir, "data", "enem-2019", "day1-images");
    await createTestPng(path.join(imageDir, "q1.png"));

    const { stdout } = await exec(TSX, [CLI, "-c", configFile, "--from", "2019", "--to", "2019", path.join(workDir, "data")]);
    expect(stdout).toContain("Format: WEBP");
    expect(stdout).toContain("Images processed:      1");
    expect(stdout).toContain("Directories processed: 1");

    const stat = await fs.stat(path.join(imageDir, "q1.webp"));
    expect(stat.size).toBeGreaterThan(0);
  });

  it("exits with error on a missing base directory", async () => {
    const configFile = path.join(workDir, "settings.json");
    try {
      await exec(TSX, [CLI, "-c", configFile, "/nonexistent/path"]);
      expect.fail("should have thrown");
    } catch (err: unknown) {
      const error = err as { code: number; stderr: string };
      expect(error.code).toBe(1);
      expect(error.stderr).toContain("Base directory not found");
    }
  });

  it("exits with error on an unsupported format", async () => {
    const configFile = path.join(workDir, "settings.json");
    await fs.writeFile(configFile, JSON.stringify({ format: "heic" }));
    try {
      await exec(TSX, [CLI, "-c", configFile, workDir]);
      expect.fail("should have thrown");
    } catch (err: unknown) {
      const error = err as { code: number; stderr: string };
      expect(error.code).toBe(1);
      expect(error.stderr).toContain("Unsupported target format: heic");
    }
  });
});
