import { gradientColorAt, toCssColor } from "@/core/gradient";
import { computeLockGeometry } from "@/core/lock-geometry";
import { GLYPH_COLOR, KEYHOLE_COLOR } from "@/shared/constants";
import type { BoundingBox, IconLayers } from "@/types/raster";

interface Frame {
  x: number;
  y: number;
  width: number;
  height: number;
}

// A box covers its end pixels, so the drawn frame is one pixel wider and taller.
function frameOf([x0, y0, x1, y1]: BoundingBox): Frame | null {
  if (x1 < x0 || y1 < y0) {
    return null;
  }
  return { x: x0, y: y0, width: x1 - x0 + 1, height: y1 - y0 + 1 };
}

function svgDocument(size: number, body: string): string {
  return (
    `<svg xmlns="http://www.w3.org/2000/svg" width="${size}" height="${size}" viewBox="0 0 ${size} ${size}" shape-rendering="crispEdges">` +
    body +
    "</svg>"
  );
}

export function roundedRectElement(box: BoundingBox, radius: number, fill: string): string {
  const frame = frameOf(box);
  if (!frame) {
    return "";
  }
  return `<rect x="${frame.x}" y="${frame.y}" width="${frame.width}" height="${frame.height}" rx="${radius}" ry="${radius}" fill="${fill}"/>`;
}

export function ellipseElement(box: BoundingBox, fill: string): string {
  const frame = frameOf(box);
  if (!frame) {
    return "";
  }
  const rx = frame.width / 2;
  const ry = frame.height / 2;
  return `<ellipse cx="${frame.x + rx}" cy="${frame.y + ry}" rx="${rx}" ry="${ry}" fill="${fill}"/>`;
}

// Upper half of the ellipse in `box`, closed along its horizontal diameter.
export function upperChordElement(box: BoundingBox, fill: string): string {
  const frame = frameOf(box);
  if (!frame) {
    return "";
  }
  const rx = frame.width / 2;
  const ry = frame.height / 2;
  const cy = frame.y + ry;
  return `<path d="M ${frame.x} ${cy} A ${rx} ${ry} 0 0 1 ${frame.x + frame.width} ${cy} Z" fill="${fill}"/>`;
}

export function gradientSvg(size: number): string {
  const rows: string[] = [];
  for (let y = 0; y < size; y++) {
    rows.push(`<rect x="0" y="${y}" width="${size}" height="1" fill="${toCssColor(gradientColorAt(y, size))}"/>`);
  }
  return svgDocument(size, rows.join(""));
}

export function cornerMaskSvg(size: number, radius: number): string {
  return svgDocument(size, roundedRectElement([0, 0, size - 1, size - 1], radius, "#FFFFFF"));
}

export function lockGlyphSvg(size: number): string {
  const { shackle, body, keyhole } = computeLockGeometry(size);
  const parts = [upperChordElement(shackle.outerBox, GLYPH_COLOR)];

  if (shackle.innerBox) {
    // The cutout is a flat color taken from the gradient just under the arch.
    const sample = gradientColorAt(shackle.cutoutSample.y, size);
    parts.push(upperChordElement(shackle.innerBox, toCssColor(sample)));
  }

  parts.push(
    roundedRectElement(body.box, body.radius, GLYPH_COLOR),
    ellipseElement(keyhole.circleBox, KEYHOLE_COLOR),
    roundedRectElement(keyhole.slotBox, keyhole.slotRadius, KEYHOLE_COLOR)
  );

  return svgDocument(size, parts.join(""));
}

export function buildIconLayers(size: number): IconLayers {
  return {
    background: gradientSvg(size),
    cornerMask: cornerMaskSvg(size, computeLockGeometry(size).cornerRadius),
    glyph: lockGlyphSvg(size)
  };
}
