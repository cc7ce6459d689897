import path from "node:path";
import fs from "node:fs/promises";
import { isImageFile } from "./utils.js";
import type { Logger, TreeLayout } from "./types.js";

export const DEFAULT_LAYOUT: TreeLayout = {
  startYear: 2009,
  endYear: 2023,
  yearPrefix: "enem-",
  dirSuffix: "-images",
};

export interface YearDirectories {
  year: number;
  yearDir: string;
  imageDirs: string[];
}

async function isDirectory(dir: string): Promise<boolean> {
  try {
    return (await fs.stat(dir)).isDirectory();
  } catch {
    return false;
  }
}

/**
 * Lists `<baseDir>/<yearPrefix><year>/*<dirSuffix>` for every year in range.
 * Missing year directories are reported and skipped; a missing base
 * directory is an error.
 */
export async function findImageDirectories(
  baseDir: string,
  layout: TreeLayout = DEFAULT_LAYOUT,
  logger: Logger = console,
): Promise<YearDirectories[]> {
  if (!(await isDirectory(baseDir))) {
    throw new Error(`Base directory not found: ${baseDir}`);
  }

  const years: YearDirectories[] = [];
  for (let year = layout.startYear; year <= layout.endYear; year++) {
    const yearDir = path.join(baseDir, `${layout.yearPrefix}${year}`);

    if (!(await isDirectory(yearDir))) {
      logger.warn(`Directory for year ${year} not found: ${yearDir}`);
      continue;
    }

    const entries = await fs.readdir(yearDir, { withFileTypes: true });
    const imageDirs = entries
      .filter((entry) => entry.isDirectory() && entry.name.endsWith(layout.dirSuffix))
      .map((entry) => entry.name)
      .sort()
      .map((name) => path.join(yearDir, name));

    years.push({ year, yearDir, imageDirs });
  }

  return years;
}

export async function listImageFiles(dir: string): Promise<string[]> {
  const entries = await fs.readdir(dir, { withFileTypes: true });
  return entries
    .filter((entry) => entry.isFile() && isImageFile(entry.name))
    .map((entry) => entry.name)
    .sort()
    .map((name) => path.join(dir, name));
}
