import { join } from "node:path";
import sharp from "sharp";
import type { Bitmap } from "@/core/bitmap";
import { iconFileName } from "@/shared/constants";
import { IconWriteError } from "@/shared/errors";

function toSharp(bitmap: Bitmap): sharp.Sharp {
  return sharp(bitmap.data, {
    raw: {
      width: bitmap.width,
      height: bitmap.height,
      channels: bitmap.channels
    }
  }).png();
}

export async function encodePng(bitmap: Bitmap): Promise<Buffer> {
  return toSharp(bitmap).toBuffer();
}

export async function writeIconPng(bitmap: Bitmap, outDir: string): Promise<string> {
  const filePath = join(outDir, iconFileName(bitmap.width));
  if (bitmap.width !== bitmap.height) {
    throw new IconWriteError(filePath, new Error(`Icons must be square, got ${bitmap.width}x${bitmap.height}`));
  }

  try {
    await toSharp(bitmap).toFile(filePath);
  } catch (error) {
    throw new IconWriteError(filePath, error);
  }
  return filePath;
}
