import { GRADIENT } from "@/shared/constants";
import type { Rgb } from "@/types/raster";

export function gradientColorAt(y: number, size: number): Rgb {
  const ratio = y / size;
  return [
    Math.trunc(GRADIENT.red.base * (GRADIENT.red.start + GRADIENT.red.gain * ratio)),
    Math.trunc(GRADIENT.green.base * (1 - ratio * GRADIENT.green.falloff)),
    Math.trunc(GRADIENT.blue.base * (1 - ratio))
  ];
}

export function toCssColor([r, g, b]: Rgb): string {
  return `rgb(${r},${g},${b})`;
}
