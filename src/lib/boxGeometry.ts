import { clampUnit } from "@/lib/coordinates";
import { oppositeCorner } from "@/lib/hitTest";
import type { Box, Corner, Point } from "@/types/annotation";

export const boxCorner = (box: Box, corner: Corner): Point => {
  const halfW = box.w / 2;
  const halfH = box.h / 2;
  switch (corner) {
    case "nw":
      return { x: box.cx - halfW, y: box.cy - halfH };
    case "ne":
      return { x: box.cx + halfW, y: box.cy - halfH };
    case "se":
      return { x: box.cx + halfW, y: box.cy + halfH };
    case "sw":
      return { x: box.cx - halfW, y: box.cy + halfH };
  }
};

export const boxesEqual = (a: Box, b: Box) =>
  a.classId === b.classId && a.cx === b.cx && a.cy === b.cy && a.w === b.w && a.h === b.h;

export const boxFromCorners = (a: Point, b: Point, classId: number): Box => {
  const left = Math.min(a.x, b.x);
  const right = Math.max(a.x, b.x);
  const top = Math.min(a.y, b.y);
  const bottom = Math.max(a.y, b.y);
  return {
    classId,
    cx: (left + right) / 2,
    cy: (top + bottom) / 2,
    w: right - left,
    h: bottom - top,
  };
};

// Center stays inside the image
export const translateBox = (box: Box, delta: Point): Box => ({
  ...box,
  cx: clampUnit(box.cx + delta.x),
  cy: clampUnit(box.cy + delta.y),
});

const direction = (target: number, fixed: number, fallback: number) => {
  const sign = Math.sign(target - fixed);
  return sign !== 0 ? sign : Math.sign(fallback - fixed) || 1;
};

/**
 * Moves one corner of `box` to `target` while the opposite corner stays put.
 * Dragging past the fixed corner flips the box; each side is held at `minSize`
 * or more, never collapsing to zero.
 */
export const resizeFromCorner = (box: Box, corner: Corner, target: Point, minSize: Point): Box => {
  const fixed = boxCorner(box, oppositeCorner(corner));
  const dragged = boxCorner(box, corner);

  const dirX = direction(target.x, fixed.x, dragged.x);
  const dirY = direction(target.y, fixed.y, dragged.y);
  const w = Math.max(Math.abs(target.x - fixed.x), minSize.x);
  const h = Math.max(Math.abs(target.y - fixed.y), minSize.y);

  return {
    ...box,
    cx: fixed.x + (dirX * w) / 2,
    cy: fixed.y + (dirY * h) / 2,
    w,
    h,
  };
};
