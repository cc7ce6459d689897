import sharp from "sharp";
import { fromRaster, toRaster } from "./codec.js";
import type { Config, EncodeParams, RasterImage, TargetFormat } from "./types.js";

export interface TransformResult {
  image: RasterImage;
  params: EncodeParams;
}

export interface Size {
  width: number;
  height: number;
}

const WEBP_METHOD = 6; // slowest, smallest output

/**
 * Applies the width cap, then the height cap to the already width-capped
 * size. Both passes keep the aspect ratio and truncate to whole pixels.
 */
export function computeTargetSize(width: number, height: number, maxWidth?: number, maxHeight?: number): Size {
  let targetWidth = width;
  let targetHeight = height;

  if (maxWidth !== undefined && targetWidth > maxWidth) {
    const ratio = maxWidth / targetWidth;
    targetHeight = Math.max(1, Math.trunc(targetHeight * ratio));
    targetWidth = maxWidth;
  }

  if (maxHeight !== undefined && targetHeight > maxHeight) {
    const ratio = maxHeight / targetHeight;
    targetWidth = Math.max(1, Math.trunc(targetWidth * ratio));
    targetHeight = maxHeight;
  }

  return { width: targetWidth, height: targetHeight };
}

export function encodeParamsFor(config: Config): EncodeParams {
  switch (config.format) {
    case "JPEG":
      return {
        format: "JPEG",
        quality: config.quality,
        progressive: config.progressive,
        optimize: config.optimize,
      };
    case "PNG":
      return { format: "PNG", optimize: true };
    case "WEBP":
      return { format: "WEBP", quality: config.quality, method: WEBP_METHOD };
    case "TIFF":
    case "GIF":
      return { format: config.format, optimize: config.optimize };
  }
}

// JPEG has no alpha channel and no palette
export function needsFlatten(image: RasterImage, format: TargetFormat): boolean {
  return format === "JPEG" && (image.hasAlpha || image.colorMode === "P");
}

async function flattenOntoWhite(image: RasterImage): Promise<RasterImage> {
  const pipeline = fromRaster(image)
    .flatten({ background: { r: 255, g: 255, b: 255 } })
    .toColourspace("srgb");
  return toRaster(pipeline, "RGB");
}

async function resizeRaster(image: RasterImage, size: Size): Promise<RasterImage> {
  const pipeline = fromRaster(image).resize(size.width, size.height, {
    fit: "fill",
    kernel: sharp.kernel.lanczos3,
  });
  const resized = await toRaster(pipeline);
  return resized.channels === image.channels
    ? { ...resized, colorMode: image.colorMode, paletteColours: image.paletteColours }
    : resized;
}

/**
 * Normalizes the colour mode for the target format, applies the size caps
 * and derives the encoder settings.
 */
export async function transformImage(image: RasterImage, config: Config): Promise<TransformResult> {
  const expected = image.width * image.height * image.channels;
  if (image.data.length !== expected) {
    throw new Error(
      `Raster data is ${image.data.length} bytes, expected ${expected} for ${image.width}x${image.height}x${image.channels}`
    );
  }

  let current = image;

  if (needsFlatten(current, config.format)) {
    current = await flattenOntoWhite(current);
  }

  if (config.maxWidth !== undefined || config.maxHeight !== undefined) {
    const size = computeTargetSize(current.width, current.height, config.maxWidth, config.maxHeight);
    if (size.width !== current.width || size.height !== current.height) {
      current = await resizeRaster(current, size);
    }
  }

  return { image: current, params: encodeParamsFor(config) };
}
