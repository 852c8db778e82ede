export const ICON_SIZES = [16, 32, 64, 128, 256, 512, 1024] as const;

export const DEFAULT_OUTPUT_DIR = "App/Assets.xcassets/AppIcon.appiconset";

export const CONTENTS_FILE_NAME = "Contents.json";

export const GLYPH_COLOR = "#FFFFFF";
export const KEYHOLE_COLOR = "#8B0000";

export const GRADIENT = {
  red: { base: 255, start: 0.98, gain: 0.02 },
  green: { base: 220, falloff: 0.4 },
  blue: { base: 100 }
} as const;

export const LOCK_PROPORTIONS = {
  cornerRadius: 0.225,
  bodyWidth: 0.35,
  bodyHeight: 0.3,
  bodyTop: 0.45,
  bodyCornerRadius: 0.15,
  shackleWidth: 0.65,
  shackleHeight: 0.22,
  shackleThickness: 0.055,
  minShackleThickness: 3,
  keyholeRadius: 0.12,
  keyholeCenterY: 0.35,
  slotWidth: 0.5,
  slotHeight: 0.25
} as const;

export function iconFileName(size: number): string {
  return `icon_${size}x${size}.png`;
}
