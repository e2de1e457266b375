import path from "node:path";
import { parseAnnotations, parseClassList, serializeAnnotations, serializeClassList, type AnnotationParseIssue } from "@/lib/annotationCodec";
import { ClassRegistry } from "@/lib/classRegistry";
import type { Logger } from "@/lib/logger";
import { DEFAULT_SETTINGS, type EditorSettings } from "@/lib/settings";
import {
  annotationPathForImage,
  createFsStorage,
  isSupportedImage,
  LoadError,
  SaveError,
  type AnnotationStorage,
} from "@/services/annotationStorage";
import { createEditorStore, type EditorStore } from "@/store/editorStore";
import type { ImageSize } from "@/types/annotation";

export type AnnotationSessionOptions = {
  folder: string;
  settings?: EditorSettings;
  storage?: AnnotationStorage;
  logger?: Logger;
};

export type ImageLoadReport = {
  imagePath: string;
  annotationPath: string;
  boxCount: number;
  issues: AnnotationParseIssue[];
  // class names appended to the registry while loading
  addedClasses: string[];
};

/**
 * Owns the editor store for one image folder and performs every file read and
 * write for it. I/O runs one task at a time and the store stays locked while a
 * task is in flight, so edits never interleave with a load or save.
 */
export class AnnotationSession {
  readonly folder: string;
  readonly store: EditorStore;
  private readonly settings: EditorSettings;
  private readonly storage: AnnotationStorage;
  private readonly logger: Logger;
  private queue: Promise<void> = Promise.resolve();

  private constructor(options: Required<AnnotationSessionOptions>, registry: ClassRegistry) {
    this.folder = path.resolve(options.folder);
    this.settings = options.settings;
    this.storage = options.storage;
    this.logger = options.logger;
    this.store = createEditorStore({ registry, settings: this.settings, logger: this.logger });
  }

  static async open({
    folder,
    settings = DEFAULT_SETTINGS,
    storage = createFsStorage(),
    logger = console,
  }: AnnotationSessionOptions): Promise<AnnotationSession> {
    const classFilePath = path.join(path.resolve(folder), settings.classFileName);

    let text: string | null;
    try {
      text = await storage.readText(classFilePath);
    } catch (error) {
      throw new LoadError(classFilePath, error);
    }

    const listed = text === null ? [] : parseClassList(text);
    const registry = new ClassRegistry(listed.length > 0 ? listed : settings.defaultClasses);
    if (text === null) {
      logger.log(`[AnnotationSession] No class file at ${classFilePath}, starting with ${registry.size} default class(es).`);
    } else {
      const replaced = registry.names.filter((name, id) => name !== listed[id]).length;
      if (replaced > 0) {
        logger.warn(`[AnnotationSession] ${replaced} blank or duplicate class name(s) in ${classFilePath} replaced with placeholders.`);
      }
      logger.log(`[AnnotationSession] Loaded ${registry.size} class(es) from ${classFilePath}.`);
    }

    return new AnnotationSession({ folder, settings, storage, logger }, registry);
  }

  get classFilePath() {
    return path.join(this.folder, this.settings.classFileName);
  }

  get imagePath() {
    return this.store.getState().imageKey;
  }

  get dirty() {
    return this.store.getState().dirty;
  }

  /**
   * Makes `imagePath` the active image. Unsaved edits on the current image are
   * saved first when `autoSaveOnNavigate` is on (a failed save rejects with a
   * SaveError and the current image stays active); otherwise they are dropped.
   */
  openImage(imagePath: string, size: ImageSize): Promise<ImageLoadReport> {
    const resolved = path.resolve(this.folder, imagePath);
    if (!isSupportedImage(resolved)) {
      return Promise.reject(new Error(`Unsupported image type: ${resolved}`));
    }

    return this.exclusive(async () => {
      const state = this.store.getState();
      if (state.imageKey && state.dirty) {
        if (this.settings.autoSaveOnNavigate) {
          await this.writeCurrent();
        } else {
          this.logger.warn(`[AnnotationSession] Discarding unsaved edits on ${state.imageKey}.`);
        }
      }
      return this.loadImage(resolved, size);
    });
  }

  /** Re-reads the active image's label file, dropping in-memory edits. */
  reload(): Promise<ImageLoadReport> {
    return this.exclusive(async () => {
      const { imageKey, imageSize } = this.store.getState();
      if (!imageKey || !imageSize) {
        throw new Error("No image is open");
      }
      return this.loadImage(imageKey, imageSize);
    });
  }

  /** Writes the active image's boxes and the class list. Rejects with SaveError. */
  save(): Promise<void> {
    return this.exclusive(() => this.writeCurrent());
  }

  saveClasses(): Promise<void> {
    return this.exclusive(() => this.writeClasses());
  }

  private exclusive<T>(task: () => Promise<T>): Promise<T> {
    const run = this.queue.then(async () => {
      this.store.getState().setLocked(true);
      try {
        return await task();
      } finally {
        this.store.getState().setLocked(false);
      }
    });
    // Keep the chain alive after a failure; the caller still sees the rejection
    this.queue = run.then(
      () => undefined,
      () => undefined
    );
    return run;
  }

  private async loadImage(imagePath: string, size: ImageSize): Promise<ImageLoadReport> {
    const annotationPath = annotationPathForImage(imagePath);
    let text: string | null;
    try {
      text = await this.storage.readText(annotationPath);
    } catch (error) {
      throw new LoadError(annotationPath, error);
    }

    const { registry } = this.store.getState();
    const classCount = registry.size;
    const { boxes, issues } = text === null ? { boxes: [], issues: [] } : parseAnnotations(text, registry);
    const addedClasses = registry.names.slice(classCount);

    this.store.getState().openImage({ key: imagePath, size, boxes });

    issues.forEach((issue) => {
      this.logger.warn(`[AnnotationSession] ${annotationPath}:${issue.line} skipped (${issue.reason}): ${issue.content}`);
    });
    if (addedClasses.length > 0) {
      this.logger.log(`[AnnotationSession] Discovered ${addedClasses.length} new class(es) in ${annotationPath}:`, addedClasses);
      try {
        await this.writeClasses();
      } catch (error) {
        this.logger.error("[AnnotationSession] Failed to persist discovered classes:", error);
      }
    }
    this.logger.log(`[AnnotationSession] Loaded ${boxes.length} box(es) for ${imagePath}.`);

    return { imagePath, annotationPath, boxCount: boxes.length, issues, addedClasses };
  }

  private async writeClasses() {
    const { registry } = this.store.getState();
    try {
      await this.storage.writeText(this.classFilePath, serializeClassList(registry.names));
    } catch (error) {
      throw new SaveError(this.classFilePath, error);
    }
  }

  private async writeCurrent() {
    const { imageKey, boxes } = this.store.getState();
    if (!imageKey) return;

    const annotationPath = annotationPathForImage(imageKey);
    try {
      await this.writeClasses();
      try {
        await this.storage.writeText(annotationPath, serializeAnnotations(boxes, this.settings.precision));
      } catch (error) {
        throw new SaveError(annotationPath, error);
      }
    } catch (error) {
      this.logger.error("[AnnotationSession] Save failed:", error);
      throw error;
    }

    this.store.getState().markSaved();
    this.logger.log(`[AnnotationSession] Saved ${boxes.length} box(es) to ${annotationPath}.`);
  }
}
