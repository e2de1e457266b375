import type { Box, Point, ScreenRect, Viewport } from "@/types/annotation";

export const clampUnit = (value: number) => Math.min(1, Math.max(0, value));

const assertViewport = ({ transform, imageSize }: Viewport) => {
  if (!(transform.scale > 0) || !Number.isFinite(transform.scale)) {
    throw new RangeError(`Viewport scale must be a positive number, got ${transform.scale}`);
  }
  if (!(imageSize.width > 0) || !(imageSize.height > 0)) {
    throw new RangeError(`Image size must be positive, got ${imageSize.width}x${imageSize.height}`);
  }
};

// Size of the whole image on screen, in screen pixels
const displayedSize = (viewport: Viewport) => {
  assertViewport(viewport);
  const { transform, imageSize } = viewport;
  return {
    width: imageSize.width * transform.scale,
    height: imageSize.height * transform.scale,
  };
};

export const toNormalized = (screen: Point, viewport: Viewport): Point => {
  const { width, height } = displayedSize(viewport);
  const { translateX, translateY } = viewport.transform;
  return {
    x: (screen.x - translateX) / width,
    y: (screen.y - translateY) / height,
  };
};

export const toScreen = (normalized: Point, viewport: Viewport): Point => {
  const { width, height } = displayedSize(viewport);
  const { translateX, translateY } = viewport.transform;
  return {
    x: normalized.x * width + translateX,
    y: normalized.y * height + translateY,
  };
};

/**
 * Converts a length in screen pixels to image fractions along each axis, so
 * pixel thresholds stay visually constant under zoom.
 */
export const screenLengthToNormalized = (pixels: number, viewport: Viewport): Point => {
  const { width, height } = displayedSize(viewport);
  return { x: pixels / width, y: pixels / height };
};

export const boxToScreenRect = (box: Box, viewport: Viewport): ScreenRect => {
  const topLeft = toScreen({ x: box.cx - box.w / 2, y: box.cy - box.h / 2 }, viewport);
  const bottomRight = toScreen({ x: box.cx + box.w / 2, y: box.cy + box.h / 2 }, viewport);
  return {
    left: topLeft.x,
    top: topLeft.y,
    right: bottomRight.x,
    bottom: bottomRight.y,
  };
};
