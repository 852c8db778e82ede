import sharp from "sharp";
import { Bitmap } from "@/core/bitmap";
import { buildIconLayers } from "@/core/icon-svg";
import { InvalidIconSizeError } from "@/shared/errors";

export function assertValidIconSize(size: number): void {
  if (!Number.isSafeInteger(size) || size <= 0) {
    throw new InvalidIconSizeError(size);
  }
}

export async function renderIcon(size: number): Promise<Bitmap> {
  assertValidIconSize(size);

  const layers = buildIconLayers(size);
  const { data, info } = await sharp(Buffer.from(layers.background))
    .composite([
      { input: Buffer.from(layers.cornerMask), blend: "dest-in" },
      { input: Buffer.from(layers.glyph), blend: "over" }
    ])
    .ensureAlpha()
    .raw()
    .toBuffer({ resolveWithObject: true });

  if (info.channels !== 4) {
    throw new Error(`Expected RGBA output, got ${info.channels} channels`);
  }
  return new Bitmap(info.width, info.height, 4, data);
}
