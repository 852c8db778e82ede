export type Channels = 1 | 2 | 3 | 4;

export type Rgb = readonly [number, number, number];

// Inclusive pixel box: [x0, y0, x1, y1] covers both end pixels.
export type BoundingBox = readonly [number, number, number, number];

export interface Point {
  x: number;
  y: number;
}

export interface LockGeometry {
  size: number;
  cornerRadius: number;
  body: {
    box: BoundingBox;
    width: number;
    height: number;
    radius: number;
  };
  shackle: {
    width: number;
    height: number;
    thickness: number;
    outerBox: BoundingBox;
    innerWidth: number;
    innerBox: BoundingBox | null;
    cutoutSample: Point;
  };
  keyhole: {
    center: Point;
    radius: number;
    circleBox: BoundingBox;
    slotBox: BoundingBox;
    slotRadius: number;
  };
}

export interface IconLayers {
  background: string;
  cornerMask: string;
  glyph: string;
}

export interface GeneratedIcon {
  size: number;
  fileName: string;
  filePath: string;
}
