import { BoundingBox, CenteringOffset } from '../models/geometry.types';

/**
 * Offset that moves the pattern's center onto the surface center.
 * An empty bounding box yields no offset. A pattern that still overflows the
 * surface after centering is reported, not rejected.
 */
export function calculateCenteringOffset(
  bounds: BoundingBox,
  surfaceWidth: number,
  surfaceHeight: number
): CenteringOffset {
  if (!bounds.hasBounds) {
    console.warn('[Centering] No coordinates available for centering calculation');
    return { dx: 0, dy: 0 };
  }

  const patternCenterX = (bounds.minX + bounds.maxX) / 2;
  const patternCenterY = (bounds.minY + bounds.maxY) / 2;
  const offset: CenteringOffset = {
    dx: surfaceWidth / 2 - patternCenterX,
    dy: surfaceHeight / 2 - patternCenterY,
  };

  console.log(
    `[Centering] Pattern ${bounds.width.toFixed(3)} x ${bounds.height.toFixed(3)}mm, ` +
      `offset (${offset.dx.toFixed(3)}, ${offset.dy.toFixed(3)})`
  );

  if (!fitsOnSurface(bounds, offset, surfaceWidth, surfaceHeight)) {
    console.warn(
      `[Centering] Centered pattern (${bounds.width.toFixed(3)} x ${bounds.height.toFixed(3)}mm) ` +
        `exceeds the ${surfaceWidth} x ${surfaceHeight}mm surface`
    );
  }

  return offset;
}

export function applyOffset(bounds: BoundingBox, offset: CenteringOffset): BoundingBox {
  if (!bounds.hasBounds) return bounds;

  return {
    ...bounds,
    minX: bounds.minX + offset.dx,
    maxX: bounds.maxX + offset.dx,
    minY: bounds.minY + offset.dy,
    maxY: bounds.maxY + offset.dy,
  };
}

export function fitsOnSurface(
  bounds: BoundingBox,
  offset: CenteringOffset,
  surfaceWidth: number,
  surfaceHeight: number
): boolean {
  if (!bounds.hasBounds) return true;

  const moved = applyOffset(bounds, offset);
  return moved.minX >= 0 && moved.maxX <= surfaceWidth && moved.minY >= 0 && moved.maxY <= surfaceHeight;
}
