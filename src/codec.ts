import sharp from "sharp";
import path from "node:path";
import fs from "node:fs/promises";
import crypto from "node:crypto";
import decodeBmp from "decode-bmp";
import { isErrnoException } from "./errors.js";
import { formatFromExtension } from "./utils.js";
import type { Channels, ColorMode, EncodeParams, RasterImage } from "./types.js";

/**
 * Decode/encode capability used by the pipeline. The default is backed by
 * sharp; tests swap in codecs that fail on purpose.
 */
export interface Codec {
  decode(inputPath: string): Promise<RasterImage>;
  /** Writes the image to `outputPath` and resolves with the number of bytes written. */
  encode(image: RasterImage, outputPath: string, params: EncodeParams): Promise<number>;
}

const MAX_INPUT_PIXELS = 268402689; // 16384 x 16384

export function colorModeFor(channels: Channels, palette = false): ColorMode {
  if (palette) return "P";
  switch (channels) {
    case 1:
      return "L";
    case 2:
      return "LA";
    case 3:
      return "RGB";
    case 4:
      return "RGBA";
  }
}

export function fromRaster(image: RasterImage): sharp.Sharp {
  return sharp(image.data, {
    raw: { width: image.width, height: image.height, channels: image.channels },
  });
}

export async function toRaster(pipeline: sharp.Sharp, colorMode?: ColorMode): Promise<RasterImage> {
  const { data, info } = await pipeline.raw().toBuffer({ resolveWithObject: true });
  return {
    data,
    width: info.width,
    height: info.height,
    channels: info.channels,
    colorMode: colorMode ?? colorModeFor(info.channels),
    hasAlpha: info.channels === 2 || info.channels === 4,
  };
}

function applyParams(pipeline: sharp.Sharp, params: EncodeParams, paletteColours?: number): sharp.Sharp {
  switch (params.format) {
    case "JPEG":
      return pipeline.jpeg({
        quality: params.quality,
        progressive: params.progressive,
        optimizeCoding: params.optimize,
      });
    case "PNG":
      if (paletteColours !== undefined) {
        return pipeline.png({
          compressionLevel: 9,
          palette: true,
          colours: paletteColours,
          dither: 0,
          effort: 10,
        });
      }
      return pipeline.png({ compressionLevel: 9, adaptiveFiltering: params.optimize });
    case "WEBP":
      return pipeline.webp({ quality: params.quality, effort: params.method });
    case "TIFF":
      return pipeline.tiff({ compression: params.optimize ? "lzw" : "none" });
    case "GIF":
      // GIF output is always palette-based
      return pipeline.gif({
        effort: params.optimize ? 10 : 7,
        ...(paletteColours !== undefined ? { colours: paletteColours, dither: 0 } : {}),
      });
  }
}

async function assertNotSymlink(outputPath: string): Promise<void> {
  try {
    const outputLstat = await fs.lstat(outputPath);
    if (outputLstat.isSymbolicLink()) {
      throw new Error("Output path is a symbolic link, refusing to overwrite");
    }
  } catch (e) {
    if (!isErrnoException(e) || e.code !== "ENOENT") throw e;
  }
}

// libvips as shipped with sharp has no BMP loader
async function decodeBitmap(inputPath: string): Promise<RasterImage> {
  const bitmap = decodeBmp(await fs.readFile(inputPath));
  const { width, height } = bitmap;
  const rgba = Buffer.from(bitmap.data.buffer, bitmap.data.byteOffset, bitmap.data.byteLength);
  if (rgba.length !== width * height * 4) {
    throw new Error(`Unexpected BMP pixel data length: ${rgba.length} for ${width}x${height}`);
  }

  let opaque = true;
  for (let i = 3; i < rgba.length; i += 4) {
    if (rgba[i] !== 255) {
      opaque = false;
      break;
    }
  }

  const pixels = sharp(rgba, { raw: { width, height, channels: 4 } });
  return toRaster(opaque ? pixels.removeAlpha() : pixels);
}

export const sharpCodec: Codec = {
  async decode(inputPath) {
    if (formatFromExtension(inputPath) === "BMP") {
      return decodeBitmap(inputPath);
    }

    const source = sharp(inputPath, {
      limitInputPixels: MAX_INPUT_PIXELS,
      sequentialRead: true,
    });
    const metadata = await source.metadata();
    const paletteBitDepth = metadata.paletteBitDepth;

    // Auto-rotate based on EXIF
    const image = await toRaster(source.rotate(), paletteBitDepth !== undefined && !metadata.hasAlpha ? "P" : undefined);
    return paletteBitDepth !== undefined ? { ...image, paletteColours: 2 ** paletteBitDepth } : image;
  },

  async encode(image, outputPath, params) {
    const tempOutput = path.join(
      path.dirname(outputPath),
      `.imgshrink-${crypto.randomBytes(8).toString("hex")}${path.extname(outputPath)}`
    );

    try {
      await applyParams(fromRaster(image), params, image.paletteColours).toFile(tempOutput);

      const tempStats = await fs.stat(tempOutput);
      if (tempStats.size === 0) {
        throw new Error("Generated file is empty");
      }

      await assertNotSymlink(outputPath);
      await fs.rename(tempOutput, outputPath);
      return tempStats.size;
    } catch (err) {
      await fs.rm(tempOutput, { force: true });
      throw err;
    }
  },
};
