import { LOCK_PROPORTIONS as P } from "@/shared/constants";
import type { LockGeometry } from "@/types/raster";

const scaled = (value: number, ratio: number): number => Math.trunc(value * ratio);
const half = (value: number): number => Math.floor(value / 2);

export function computeLockGeometry(size: number): LockGeometry {
  const bodyWidth = scaled(size, P.bodyWidth);
  const bodyHeight = scaled(size, P.bodyHeight);
  const bodyX = half(size - bodyWidth);
  const bodyY = scaled(size, P.bodyTop);

  const shackleWidth = scaled(bodyWidth, P.shackleWidth);
  const shackleHeight = scaled(size, P.shackleHeight);
  const shackleX = bodyX + half(bodyWidth - shackleWidth);
  const shackleY = bodyY - shackleHeight;
  const thickness = Math.max(scaled(size, P.shackleThickness), P.minShackleThickness);
  const innerWidth = shackleWidth - thickness * 2;

  const keyholeRadius = scaled(bodyWidth, P.keyholeRadius);
  const keyholeX = bodyX + half(bodyWidth);
  const keyholeY = bodyY + scaled(bodyHeight, P.keyholeCenterY);
  const slotHalfWidth = scaled(keyholeRadius, P.slotWidth);
  const slotHeight = scaled(bodyHeight, P.slotHeight);

  return {
    size,
    cornerRadius: scaled(size, P.cornerRadius),
    body: {
      box: [bodyX, bodyY, bodyX + bodyWidth, bodyY + bodyHeight],
      width: bodyWidth,
      height: bodyHeight,
      radius: scaled(bodyWidth, P.bodyCornerRadius)
    },
    shackle: {
      width: shackleWidth,
      height: shackleHeight,
      thickness,
      outerBox: [shackleX - thickness, shackleY, shackleX + shackleWidth + thickness, shackleY + shackleHeight * 2],
      innerWidth,
      innerBox:
        innerWidth > 0
          ? [shackleX + thickness, shackleY + thickness, shackleX + thickness + innerWidth, shackleY + shackleHeight * 2 - thickness]
          : null,
      cutoutSample: { x: half(size), y: Math.min(shackleY + shackleHeight, size - 1) }
    },
    keyhole: {
      center: { x: keyholeX, y: keyholeY },
      radius: keyholeRadius,
      circleBox: [keyholeX - keyholeRadius, keyholeY - keyholeRadius, keyholeX + keyholeRadius, keyholeY + keyholeRadius],
      slotBox: [keyholeX - slotHalfWidth, keyholeY, keyholeX + slotHalfWidth, keyholeY + slotHeight],
      slotRadius: slotHalfWidth
    }
  };
}
