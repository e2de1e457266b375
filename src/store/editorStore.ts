import { createStore, type StoreApi } from "zustand/vanilla";
import { boxesEqual, boxFromCorners, resizeFromCorner, translateBox } from "@/lib/boxGeometry";
import { ClassRegistry } from "@/lib/classRegistry";
import { clampUnit, screenLengthToNormalized, toNormalized, toScreen } from "@/lib/coordinates";
import { hitTest } from "@/lib/hitTest";
import type { Logger } from "@/lib/logger";
import { DEFAULT_SETTINGS, handleRadiusFor, type EditorSettings } from "@/lib/settings";
import { UndoStack } from "@/lib/undoStack";
import type { Box, Corner, HitResult, ImageSize, Point, Selection, Transform, UndoEntry, Viewport } from "@/types/annotation";

const FALLBACK_CLASS = "object";

// Absorbs rounding when a drag extent is compared against the pixel minimum
const PIXEL_EPSILON = 1e-6;

const NO_SELECTION: Selection = { index: null, mode: { kind: "none" } };

export type OpenImagePayload = {
  key: string;
  size: ImageSize;
  boxes: Box[];
};

export interface EditorState {
  // Active image
  imageKey: string | null;
  imageSize: ImageSize | null;
  boxes: Box[];
  selection: Selection;
  dirty: boolean;

  // Set while the owning session is reading or writing files
  locked: boolean;

  // Classes
  registry: ClassRegistry;
  classNames: readonly string[];
  activeClassId: number;

  undoDepth: number;

  // Actions - image lifecycle
  openImage: (payload: OpenImagePayload) => void;
  closeImage: () => void;
  markSaved: () => void;
  setLocked: (locked: boolean) => void;

  // Actions - classes
  setActiveClass: (classId: number) => boolean;
  addClass: (name: string) => number;
  syncClasses: () => void;

  // Actions - editing
  hitTestAt: (point: Point, transform: Transform) => HitResult;
  selectAt: (point: Point, transform: Transform) => HitResult;
  clearSelection: () => void;
  createBox: (start: Point, end: Point, transform: Transform) => boolean;
  moveSelected: (delta: Point) => boolean;
  resizeSelected: (corner: Corner, point: Point, transform: Transform) => boolean;
  deleteSelected: () => boolean;
  duplicateSelected: () => boolean;
  assignClass: (target: number | string) => boolean;

  // Actions - pointer gestures
  pointerDown: (point: Point, transform: Transform) => HitResult;
  pointerMove: (point: Point, transform: Transform) => void;
  pointerUp: (point: Point, transform: Transform) => boolean;
  cancelGesture: () => void;

  // Actions - history
  undo: () => boolean;
  canUndo: () => boolean;
}

export type EditorStore = StoreApi<EditorState>;

export type EditorStoreOptions = {
  registry?: ClassRegistry;
  settings?: EditorSettings;
  logger?: Logger;
};

const validSelection = (index: number | null, boxes: readonly Box[]) =>
  index !== null && index >= 0 && index < boxes.length ? index : null;

const replaceAt = (boxes: readonly Box[], index: number, box: Box) =>
  boxes.map((existing, i) => (i === index ? box : existing));

const insertAt = (boxes: readonly Box[], index: number, box: Box) => [
  ...boxes.slice(0, index),
  box,
  ...boxes.slice(index),
];

const removeAt = (boxes: readonly Box[], index: number) => boxes.filter((_, i) => i !== index);

const invertEntry = (entry: UndoEntry, boxes: readonly Box[]): Box[] => {
  switch (entry.type) {
    case "create":
    case "duplicate":
      return removeAt(boxes, entry.index);
    case "delete":
      return insertAt(boxes, entry.index, entry.box);
    case "move":
    case "resize":
      return replaceAt(boxes, entry.index, entry.before);
    case "assign-class":
      return replaceAt(boxes, entry.index, { ...boxes[entry.index], classId: entry.before });
  }
};

export const createEditorStore = ({
  registry = new ClassRegistry(DEFAULT_SETTINGS.defaultClasses),
  settings = DEFAULT_SETTINGS,
  logger = console,
}: EditorStoreOptions = {}): EditorStore => {
  if (registry.size === 0) {
    registry.addExplicit(FALLBACK_CLASS);
  }
  const history = new UndoStack<UndoEntry>(settings.undoCapacity);

  return createStore<EditorState>()((set, get) => {
    const viewportFor = (transform: Transform): Viewport | null => {
      const { imageSize } = get();
      return imageSize ? { transform, imageSize } : null;
    };

    // Editing is possible only with an image open and no file I/O in flight
    const editable = () => {
      const { imageSize, locked } = get();
      return imageSize !== null && !locked;
    };

    const selectedBox = () => {
      const { boxes, selection } = get();
      const index = validSelection(selection.index, boxes);
      return index === null ? null : { index, box: boxes[index] };
    };

    const minSizeFor = (viewport: Viewport) => screenLengthToNormalized(settings.minBoxPixels, viewport);

    const clampedNormalized = (point: Point, viewport: Viewport): Point => {
      const normalized = toNormalized(point, viewport);
      return { x: clampUnit(normalized.x), y: clampUnit(normalized.y) };
    };

    const record = (entry: UndoEntry, patch: Partial<EditorState>) => {
      history.push(entry);
      set({
        ...patch,
        dirty: true,
        undoDepth: history.size,
        classNames: registry.names,
      });
    };

    const runHitTest = (point: Point, transform: Transform): HitResult => {
      const viewport = viewportFor(transform);
      if (!viewport) return { kind: "none" };
      const { boxes, selection } = get();
      return hitTest({
        point,
        boxes,
        selectedIndex: validSelection(selection.index, boxes),
        viewport,
        tolerance: settings.clickTolerance,
        handleRadius: handleRadiusFor(settings),
      });
    };

    const applySelection = (hit: HitResult) => {
      set({ selection: { index: hit.kind === "none" ? null : hit.index, mode: { kind: "none" } } });
    };

    const commitGesture = (type: "move" | "resize", origin: Box) => {
      const current = selectedBox();
      set((state) => ({ selection: { ...state.selection, mode: { kind: "none" } } }));
      if (!current || boxesEqual(current.box, origin)) return false;
      record(
        { type, index: current.index, before: origin, after: current.box, previousSelection: current.index },
        {}
      );
      return true;
    };

    return {
      imageKey: null,
      imageSize: null,
      boxes: [],
      selection: NO_SELECTION,
      dirty: false,
      locked: false,
      registry,
      classNames: registry.names,
      activeClassId: 0,
      undoDepth: 0,

      openImage: ({ key, size, boxes }) => {
        if (!(size.width > 0) || !(size.height > 0)) {
          throw new RangeError(`Image ${key} has invalid size ${size.width}x${size.height}`);
        }
        // History never crosses images
        history.clear();
        set({
          imageKey: key,
          imageSize: { ...size },
          boxes: boxes.map((box) => ({ ...box })),
          selection: NO_SELECTION,
          dirty: false,
          undoDepth: 0,
          classNames: registry.names,
        });
      },

      closeImage: () => {
        history.clear();
        set({
          imageKey: null,
          imageSize: null,
          boxes: [],
          selection: NO_SELECTION,
          dirty: false,
          undoDepth: 0,
        });
      },

      markSaved: () => set({ dirty: false }),

      setLocked: (locked) => set({ locked }),

      setActiveClass: (classId) => {
        if (!registry.has(classId)) return false;
        set({ activeClassId: classId });
        return true;
      },

      addClass: (name) => {
        const classId = registry.addExplicit(name);
        set({ activeClassId: classId, classNames: registry.names });
        return classId;
      },

      syncClasses: () => set({ classNames: registry.names }),

      hitTestAt: (point, transform) => runHitTest(point, transform),

      selectAt: (point, transform) => {
        if (!editable()) return { kind: "none" };
        const hit = runHitTest(point, transform);
        applySelection(hit);
        return hit;
      },

      clearSelection: () => set({ selection: NO_SELECTION }),

      createBox: (start, end, transform) => {
        const viewport = viewportFor(transform);
        if (!viewport || !editable()) return false;

        const from = clampedNormalized(start, viewport);
        const to = clampedNormalized(end, viewport);
        const screenFrom = toScreen(from, viewport);
        const screenTo = toScreen(to, viewport);
        const minimum = settings.minBoxPixels - PIXEL_EPSILON;
        if (Math.abs(screenTo.x - screenFrom.x) < minimum || Math.abs(screenTo.y - screenFrom.y) < minimum) {
          return false;
        }

        const { boxes, selection, activeClassId } = get();
        const classId = registry.has(activeClassId) ? activeClassId : 0;
        const box = boxFromCorners(from, to, classId);
        const index = boxes.length;
        record(
          { type: "create", index, box, previousSelection: validSelection(selection.index, boxes) },
          { boxes: [...boxes, box], selection: { index, mode: { kind: "none" } } }
        );
        return true;
      },

      moveSelected: (delta) => {
        const current = selectedBox();
        if (!current || !editable()) return false;
        const moved = translateBox(current.box, delta);
        if (boxesEqual(moved, current.box)) return false;
        record(
          { type: "move", index: current.index, before: current.box, after: moved, previousSelection: current.index },
          { boxes: replaceAt(get().boxes, current.index, moved) }
        );
        return true;
      },

      resizeSelected: (corner, point, transform) => {
        const viewport = viewportFor(transform);
        const current = selectedBox();
        if (!viewport || !current || !editable()) return false;
        const resized = resizeFromCorner(current.box, corner, clampedNormalized(point, viewport), minSizeFor(viewport));
        if (boxesEqual(resized, current.box)) return false;
        record(
          { type: "resize", index: current.index, before: current.box, after: resized, previousSelection: current.index },
          { boxes: replaceAt(get().boxes, current.index, resized) }
        );
        return true;
      },

      deleteSelected: () => {
        const current = selectedBox();
        if (!current || !editable()) return false;
        record(
          { type: "delete", index: current.index, box: current.box, previousSelection: current.index },
          { boxes: removeAt(get().boxes, current.index), selection: NO_SELECTION }
        );
        return true;
      },

      duplicateSelected: () => {
        const current = selectedBox();
        if (!current || !editable()) return false;
        const copy = { ...current.box };
        const index = current.index + 1;
        record(
          { type: "duplicate", index, box: copy, previousSelection: current.index },
          { boxes: insertAt(get().boxes, index, copy), selection: { index, mode: { kind: "none" } } }
        );
        return true;
      },

      assignClass: (target) => {
        const current = selectedBox();
        if (!current || !editable()) return false;

        let classId: number;
        if (typeof target === "number") {
          if (!registry.has(target)) return false;
          classId = target;
        } else {
          try {
            classId = registry.resolve(target);
          } catch (error) {
            logger.warn("[EditorStore] Class assignment rejected:", error instanceof Error ? error.message : error);
            return false;
          }
        }
        if (classId === current.box.classId) return false;

        record(
          { type: "assign-class", index: current.index, before: current.box.classId, after: classId, previousSelection: current.index },
          { boxes: replaceAt(get().boxes, current.index, { ...current.box, classId }) }
        );
        return true;
      },

      pointerDown: (point, transform) => {
        if (!editable()) return { kind: "none" };
        const hit = runHitTest(point, transform);
        const { boxes } = get();

        switch (hit.kind) {
          case "handle":
            set({ selection: { index: hit.index, mode: { kind: "resizing", corner: hit.corner, origin: boxes[hit.index] } } });
            break;
          case "box":
            set({ selection: { index: hit.index, mode: { kind: "moving", start: point, origin: boxes[hit.index] } } });
            break;
          case "none":
            set({ selection: { index: null, mode: { kind: "creating", start: point, current: point } } });
            break;
        }
        return hit;
      },

      pointerMove: (point, transform) => {
        const viewport = viewportFor(transform);
        if (!viewport || !editable()) return;
        const { selection, boxes } = get();
        const { mode } = selection;
        const index = validSelection(selection.index, boxes);

        if (mode.kind === "creating") {
          set({ selection: { ...selection, mode: { ...mode, current: point } } });
          return;
        }
        if (index === null) return;

        if (mode.kind === "moving") {
          const from = toNormalized(mode.start, viewport);
          const to = toNormalized(point, viewport);
          const moved = translateBox(mode.origin, { x: to.x - from.x, y: to.y - from.y });
          if (!boxesEqual(moved, boxes[index])) set({ boxes: replaceAt(boxes, index, moved), dirty: true });
        } else if (mode.kind === "resizing") {
          const resized = resizeFromCorner(mode.origin, mode.corner, clampedNormalized(point, viewport), minSizeFor(viewport));
          if (!boxesEqual(resized, boxes[index])) set({ boxes: replaceAt(boxes, index, resized), dirty: true });
        }
      },

      pointerUp: (point, transform) => {
        const { mode } = get().selection;
        if (mode.kind !== "none" && !editable()) {
          get().cancelGesture();
          return false;
        }
        switch (mode.kind) {
          case "none":
            return false;
          case "creating":
            set({ selection: NO_SELECTION });
            return get().createBox(mode.start, point, transform);
          case "moving":
            get().pointerMove(point, transform);
            return commitGesture("move", mode.origin);
          case "resizing":
            get().pointerMove(point, transform);
            return commitGesture("resize", mode.origin);
        }
      },

      cancelGesture: () => {
        const { selection, boxes } = get();
        const { mode } = selection;
        const index = validSelection(selection.index, boxes);
        if ((mode.kind === "moving" || mode.kind === "resizing") && index !== null) {
          set({ boxes: replaceAt(boxes, index, mode.origin), selection: { index, mode: { kind: "none" } } });
          return;
        }
        set({ selection: { index, mode: { kind: "none" } } });
      },

      undo: () => {
        if (get().locked) return false;
        const entry = history.pop();
        if (!entry) return false;

        // Classes stay registered: ids may already be on disk
        const next = invertEntry(entry, get().boxes);
        set({
          boxes: next,
          selection: { index: validSelection(entry.previousSelection, next), mode: { kind: "none" } },
          dirty: true,
          undoDepth: history.size,
        });
        return true;
      },

      canUndo: () => history.canUndo(),
    };
  });
};
