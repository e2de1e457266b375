/**
 * Bounding box in normalized image space: center-based, every field a fraction
 * of the image width or height.
 */
export type Box = {
  classId: number;
  cx: number;
  cy: number;
  w: number;
  h: number;
};

export type Point = {
  x: number;
  y: number;
};

export type ImageSize = {
  width: number;
  height: number;
};

// Caller-owned viewport: screen = image pixel * scale + translate
export type Transform = {
  scale: number;
  translateX: number;
  translateY: number;
};

export type Viewport = {
  transform: Transform;
  imageSize: ImageSize;
};

export type ScreenRect = {
  left: number;
  top: number;
  right: number;
  bottom: number;
};

export const CORNERS = ["nw", "ne", "se", "sw"] as const;

export type Corner = (typeof CORNERS)[number];

export type InteractionMode =
  | { kind: "none" }
  | { kind: "creating"; start: Point; current: Point }
  | { kind: "moving"; start: Point; origin: Box }
  | { kind: "resizing"; corner: Corner; origin: Box };

export type Selection = {
  index: number | null;
  mode: InteractionMode;
};

export type HitResult =
  | { kind: "handle"; index: number; corner: Corner }
  | { kind: "box"; index: number }
  | { kind: "none" };

/**
 * One reversible user action. Each variant carries only what is needed to
 * invert it. Classes appended by an action are never removed on undo.
 */
export type UndoEntry =
  | { type: "create"; index: number; box: Box; previousSelection: number | null }
  | { type: "move"; index: number; before: Box; after: Box; previousSelection: number | null }
  | { type: "resize"; index: number; before: Box; after: Box; previousSelection: number | null }
  | { type: "delete"; index: number; box: Box; previousSelection: number | null }
  | { type: "duplicate"; index: number; box: Box; previousSelection: number | null }
  | { type: "assign-class"; index: number; before: number; after: number; previousSelection: number | null };
