import { describe, expect, it, vi } from "vitest";
import { DEFAULT_SETTINGS } from "@/lib/settings";
import { AnnotationSession } from "@/services/annotationSession";
import { LoadError, SaveError } from "@/services/annotationStorage";
import type { Transform } from "@/types/annotation";
import { MemoryStorage } from "./memoryStorage";

const FOLDER = "/data/set";
const CLASS_FILE = "/data/set/_darknet.labels";
const LABEL_A = "/data/set/a.txt";
const LABEL_B = "/data/set/b.txt";
const SIZE = { width: 200, height: 100 };
const identity: Transform = { scale: 1, translateX: 0, translateY: 0 };

const createLogger = () => ({ log: vi.fn(), warn: vi.fn(), error: vi.fn() });

const openSession = async (files: Record<string, string> = {}, settings = DEFAULT_SETTINGS) => {
  const storage = new MemoryStorage(files);
  const logger = createLogger();
  const session = await AnnotationSession.open({ folder: FOLDER, settings, storage, logger });
  return { session, storage, logger };
};

// Draws a box covering screen (20,10)-(60,50) on the 200x100 image
const drawBox = (session: AnnotationSession) =>
  session.store.getState().createBox({ x: 20, y: 10 }, { x: 60, y: 50 }, identity);

const caught = (promise: Promise<unknown>) => promise.then(() => undefined, (error: unknown) => error);

describe("AnnotationSession.open", () => {
  it("starts with the default class when no class file exists", async () => {
    const { session, logger } = await openSession();

    expect(session.store.getState().classNames).toEqual(["object"]);
    expect(session.classFilePath).toBe(CLASS_FILE);
    expect(logger.log).toHaveBeenCalledWith(
      `[AnnotationSession] No class file at ${CLASS_FILE}, starting with 1 default class(es).`
    );
  });

  it("reads class names in order", async () => {
    const { session } = await openSession({ [CLASS_FILE]: "cat\ndog\n" });

    expect(session.store.getState().classNames).toEqual(["cat", "dog"]);
  });

  it("replaces blank class names with placeholders", async () => {
    const { session, logger } = await openSession({ [CLASS_FILE]: "cat\n\ndog\n" });

    expect(session.store.getState().classNames).toEqual(["cat", "class_1", "dog"]);
    expect(logger.warn).toHaveBeenCalledWith(
      `[AnnotationSession] 1 blank or duplicate class name(s) in ${CLASS_FILE} replaced with placeholders.`
    );
  });

  it("fails with a LoadError when the class file is unreadable", async () => {
    const storage = new MemoryStorage();
    storage.failRead(CLASS_FILE, "EIO");

    const error = await caught(AnnotationSession.open({ folder: FOLDER, storage, logger: createLogger() }));

    expect(error).toBeInstanceOf(LoadError);
    if (error instanceof LoadError) {
      expect(error.filePath).toBe(CLASS_FILE);
      expect(error.message).toBe(`Failed to read ${CLASS_FILE}: EIO: simulated failure, '${CLASS_FILE}'`);
    }
  });
});

describe("AnnotationSession.openImage", () => {
  it("loads boxes and appends classes named in the label file", async () => {
    const { session, storage } = await openSession({
      [CLASS_FILE]: "blue_ring\n",
      [LABEL_A]: "red_ring 0.1 0.1 0.2 0.2\n",
    });

    const report = await session.openImage("a.png", SIZE);

    expect(report).toEqual({
      imagePath: "/data/set/a.png",
      annotationPath: LABEL_A,
      boxCount: 1,
      issues: [],
      addedClasses: ["red_ring"],
    });
    expect(session.store.getState().boxes).toEqual([{ classId: 1, cx: 0.1, cy: 0.1, w: 0.2, h: 0.2 }]);
    expect(session.store.getState().classNames).toEqual(["blue_ring", "red_ring"]);
    expect(storage.files.get(CLASS_FILE)).toBe("blue_ring\nred_ring\n");
    expect(session.dirty).toBe(false);
  });

  it("keeps the loaded classes when writing them back fails", async () => {
    const { session, storage, logger } = await openSession({ [LABEL_A]: "bird 0.5 0.5 0.2 0.2\n" });
    storage.failWrite(CLASS_FILE, "EROFS");

    const report = await session.openImage("a.png", SIZE);

    expect(report.addedClasses).toEqual(["bird"]);
    expect(session.store.getState().classNames).toEqual(["object", "bird"]);
    expect(logger.error).toHaveBeenCalledWith(
      "[AnnotationSession] Failed to persist discovered classes:",
      expect.any(SaveError)
    );
  });

  it("skips malformed lines and reports them", async () => {
    const { session, logger } = await openSession({ [LABEL_A]: "0 0.5 0.5 0.2 0.2\n0 0.5\n" });

    const report = await session.openImage("a.png", SIZE);

    expect(report.boxCount).toBe(1);
    expect(report.issues).toEqual([{ line: 2, content: "0 0.5", reason: "expected 5 fields, found 2" }]);
    expect(logger.warn).toHaveBeenCalledWith(
      `[AnnotationSession] ${LABEL_A}:2 skipped (expected 5 fields, found 2): 0 0.5`
    );
  });

  it("opens an image without a label file as empty", async () => {
    const { session, storage } = await openSession();

    const report = await session.openImage("a.png", SIZE);

    expect(report.boxCount).toBe(0);
    expect(session.store.getState().boxes).toEqual([]);
    expect(storage.writes).toEqual([]);
  });

  it("rejects unsupported file types", async () => {
    const { session } = await openSession();

    await expect(session.openImage("notes.gif", SIZE)).rejects.toThrow("Unsupported image type: /data/set/notes.gif");
    expect(session.imagePath).toBeNull();
  });

  it("discards unsaved edits by default", async () => {
    const { session, storage, logger } = await openSession();
    await session.openImage("a.png", SIZE);
    drawBox(session);

    await session.openImage("b.png", SIZE);

    expect(logger.warn).toHaveBeenCalledWith("[AnnotationSession] Discarding unsaved edits on /data/set/a.png.");
    expect(storage.files.has(LABEL_A)).toBe(false);
    expect(session.imagePath).toBe("/data/set/b.png");
  });

  it("saves before navigating when auto-save is on", async () => {
    const settings = { ...DEFAULT_SETTINGS, autoSaveOnNavigate: true };
    const { session, storage } = await openSession({}, settings);
    await session.openImage("a.png", SIZE);
    drawBox(session);

    await session.openImage("b.png", SIZE);

    expect(storage.files.get(LABEL_A)).toBe("0 0.200000 0.300000 0.200000 0.400000\n");
    expect(session.imagePath).toBe("/data/set/b.png");
    expect(session.dirty).toBe(false);
  });

  it("stays on the current image when auto-save fails", async () => {
    const settings = { ...DEFAULT_SETTINGS, autoSaveOnNavigate: true };
    const { session, storage } = await openSession({}, settings);
    await session.openImage("a.png", SIZE);
    drawBox(session);
    storage.failWrite(LABEL_A, "EACCES");

    const error = await caught(session.openImage("b.png", SIZE));

    expect(error).toBeInstanceOf(SaveError);
    expect(session.imagePath).toBe("/data/set/a.png");
    expect(session.dirty).toBe(true);
    expect(session.store.getState().locked).toBe(false);
  });
});

describe("AnnotationSession.save", () => {
  it("writes the class list and the boxes at six decimals", async () => {
    const { session, storage, logger } = await openSession();
    await session.openImage("a.png", SIZE);
    drawBox(session);

    await session.save();

    expect(storage.files.get(CLASS_FILE)).toBe("object\n");
    expect(storage.files.get(LABEL_A)).toBe("0 0.200000 0.300000 0.200000 0.400000\n");
    expect(storage.writes).toEqual([CLASS_FILE, LABEL_A]);
    expect(session.dirty).toBe(false);
    expect(logger.log).toHaveBeenCalledWith(`[AnnotationSession] Saved 1 box(es) to ${LABEL_A}.`);
  });

  it("writes an unedited numeric file back unchanged", async () => {
    const original = "1 0.100000 0.200000 0.300000 0.400000\n0 0.500000 0.500000 0.250000 0.125000\n";
    const { session, storage } = await openSession({ [CLASS_FILE]: "cat\ndog\n", [LABEL_B]: original });
    await session.openImage("b.png", SIZE);

    await session.save();

    expect(storage.files.get(LABEL_B)).toBe(original);
    expect(storage.files.get(CLASS_FILE)).toBe("cat\ndog\n");
  });

  it("reports a permission failure and keeps the edits", async () => {
    const { session, storage, logger } = await openSession();
    await session.openImage("a.png", SIZE);
    drawBox(session);
    storage.failWrite(LABEL_A, "EACCES");

    const error = await caught(session.save());

    expect(error).toBeInstanceOf(SaveError);
    if (error instanceof SaveError) {
      expect(error.code).toBe("permission-denied");
      expect(error.filePath).toBe(LABEL_A);
      expect(error.message).toBe(`No permission to write ${LABEL_A}: EACCES: simulated failure, '${LABEL_A}'`);
    }
    expect(session.dirty).toBe(true);
    expect(session.store.getState().boxes).toHaveLength(1);
    expect(logger.error).toHaveBeenCalledWith("[AnnotationSession] Save failed:", error);
  });

  it("reports other write failures as I/O errors", async () => {
    const { session, storage } = await openSession();
    await session.openImage("a.png", SIZE);
    drawBox(session);
    storage.failWrite(CLASS_FILE, "ENOSPC");

    const error = await caught(session.save());

    expect(error).toBeInstanceOf(SaveError);
    if (error instanceof SaveError) {
      expect(error.code).toBe("io");
      expect(error.filePath).toBe(CLASS_FILE);
    }
    expect(storage.files.has(LABEL_A)).toBe(false);
    expect(session.dirty).toBe(true);
  });

  it("can retry after a failure", async () => {
    const { session, storage } = await openSession();
    await session.openImage("a.png", SIZE);
    drawBox(session);
    storage.failWrite(LABEL_A, "EPERM");
    await caught(session.save());

    storage.clearFailures();
    await session.save();

    expect(storage.files.get(LABEL_A)).toBe("0 0.200000 0.300000 0.200000 0.400000\n");
    expect(session.dirty).toBe(false);
  });
});

describe("class ids across saves", () => {
  it("keeps a saved class id after its assignment is undone", async () => {
    const { session, storage } = await openSession({ [CLASS_FILE]: "cat\ndog\n", [LABEL_A]: "0 0.5 0.5 0.2 0.2\n" });
    await session.openImage("a.png", SIZE);
    session.store.getState().selectAt({ x: 100, y: 50 }, identity);
    session.store.getState().assignClass("car");
    await session.save();
    expect(storage.files.get(LABEL_A)).toBe("2 0.500000 0.500000 0.200000 0.200000\n");

    session.store.getState().undo();
    await session.openImage("b.png", SIZE);
    expect(session.store.getState().addClass("person")).toBe(3);
    await session.save();

    expect(storage.files.get(CLASS_FILE)).toBe("cat\ndog\ncar\nperson\n");
    expect(storage.files.get(LABEL_A)).toBe("2 0.500000 0.500000 0.200000 0.200000\n");
  });
});

describe("AnnotationSession.reload", () => {
  it("restores the boxes from disk", async () => {
    const { session } = await openSession({ [LABEL_A]: "0 0.5 0.5 0.2 0.2\n" });
    await session.openImage("a.png", SIZE);
    drawBox(session);

    const report = await session.reload();

    expect(report.boxCount).toBe(1);
    expect(session.store.getState().boxes).toEqual([{ classId: 0, cx: 0.5, cy: 0.5, w: 0.2, h: 0.2 }]);
    expect(session.dirty).toBe(false);
    expect(session.store.getState().canUndo()).toBe(false);
  });

  it("fails without an open image", async () => {
    const { session } = await openSession();

    await expect(session.reload()).rejects.toThrow("No image is open");
  });

  it("locks the editor while the read is in flight", async () => {
    const { session, storage } = await openSession({ [LABEL_A]: "0 0.5 0.5 0.2 0.2\n" });
    await session.openImage("a.png", SIZE);
    const gate = storage.pauseReads();

    const pending = session.reload();
    await gate.reached;

    expect(session.store.getState().locked).toBe(true);
    expect(drawBox(session)).toBe(false);
    expect(session.store.getState().boxes).toHaveLength(1);

    gate.release();
    await pending;

    expect(session.store.getState().locked).toBe(false);
    expect(drawBox(session)).toBe(true);
  });

  it("runs queued work after the pending read", async () => {
    const { session, storage } = await openSession({ [LABEL_A]: "0 0.5 0.5 0.2 0.2\n" });
    await session.openImage("a.png", SIZE);
    const gate = storage.pauseReads();

    const reloading = session.reload();
    const saving = session.save();
    await gate.reached;
    expect(storage.writes).toEqual([]);

    gate.release();
    await Promise.all([reloading, saving]);

    expect(storage.writes).toEqual([CLASS_FILE, LABEL_A]);
    expect(storage.files.get(LABEL_A)).toBe("0 0.500000 0.500000 0.200000 0.200000\n");
  });
});
