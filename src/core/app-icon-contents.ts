import { iconFileName } from "@/shared/constants";

export type IconIdiom = "mac" | "universal";
export type IconScale = "1x" | "2x";

export interface AppIconImage {
  idiom: IconIdiom;
  size: string;
  scale: IconScale;
  platform?: "ios";
  filename?: string;
}

export interface AppIconContents {
  images: AppIconImage[];
  info: {
    author: "xcode";
    version: 1;
  };
}

interface IconSlot {
  idiom: IconIdiom;
  points: number;
  scale: IconScale;
  platform?: "ios";
}

const MAC_POINT_SIZES = [16, 32, 128, 256, 512];

const SLOTS: IconSlot[] = [
  ...MAC_POINT_SIZES.flatMap((points): IconSlot[] => [
    { idiom: "mac", points, scale: "1x" },
    { idiom: "mac", points, scale: "2x" }
  ]),
  { idiom: "universal", points: 1024, scale: "1x", platform: "ios" }
];

function pixelSize(slot: IconSlot): number {
  return slot.scale === "2x" ? slot.points * 2 : slot.points;
}

export function buildAppIconContents(sizes: readonly number[]): AppIconContents {
  const available = new Set(sizes);

  const images = SLOTS.map((slot): AppIconImage => {
    const image: AppIconImage = {
      idiom: slot.idiom,
      size: `${slot.points}x${slot.points}`,
      scale: slot.scale
    };
    if (slot.platform) {
      image.platform = slot.platform;
    }

    const pixels = pixelSize(slot);
    if (available.has(pixels)) {
      image.filename = iconFileName(pixels);
    }
    return image;
  });

  return {
    images,
    info: {
      author: "xcode",
      version: 1
    }
  };
}
