import type { Channels } from "@/types/raster";

export class Bitmap {
  constructor(
    readonly width: number,
    readonly height: number,
    readonly channels: Channels,
    readonly data: Buffer
  ) {
    if (!Number.isSafeInteger(width) || !Number.isSafeInteger(height) || width <= 0 || height <= 0) {
      throw new RangeError(`Bitmap dimensions must be positive integers, got ${width}x${height}`);
    }

    const expected = width * height * channels;
    if (data.length !== expected) {
      throw new RangeError(`Expected ${expected} bytes for a ${width}x${height}x${channels} bitmap, got ${data.length}`);
    }
  }

  getPixel(x: number, y: number): number[] {
    if (!Number.isInteger(x) || !Number.isInteger(y) || x < 0 || y < 0 || x >= this.width || y >= this.height) {
      throw new RangeError(`Pixel (${x}, ${y}) is outside the ${this.width}x${this.height} bitmap`);
    }

    const offset = (y * this.width + x) * this.channels;
    return [...this.data.subarray(offset, offset + this.channels)];
  }

  equals(other: Bitmap): boolean {
    return (
      this.width === other.width &&
      this.height === other.height &&
      this.channels === other.channels &&
      this.data.equals(other.data)
    );
  }
}
