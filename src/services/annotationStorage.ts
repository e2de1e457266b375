import { promises as fs } from "node:fs";
import path from "node:path";

export const SUPPORTED_IMAGE_EXTENSIONS = [".png", ".jpg", ".jpeg", ".bmp", ".webp", ".tif", ".tiff"];

export const isSupportedImage = (filePath: string) => {
  const ext = path.extname(filePath).toLowerCase();
  return SUPPORTED_IMAGE_EXTENSIONS.includes(ext);
};

// `<image_basename>.txt` beside the image
export const annotationPathForImage = (imagePath: string) => {
  const { dir, name } = path.parse(imagePath);
  return path.join(dir, `${name}.txt`);
};

/**
 * Text file access used by the session. `readText` resolves to null when the
 * file does not exist; every other failure rejects.
 */
export interface AnnotationStorage {
  readText(filePath: string): Promise<string | null>;
  writeText(filePath: string, content: string): Promise<void>;
}

export type SaveErrorCode = "permission-denied" | "io";

const PERMISSION_CODES = new Set(["EACCES", "EPERM", "EROFS"]);

const errorCode = (error: unknown) => {
  if (typeof error === "object" && error !== null && "code" in error && typeof error.code === "string") {
    return error.code;
  }
  return undefined;
};

export class SaveError extends Error {
  readonly code: SaveErrorCode;
  readonly filePath: string;

  constructor(filePath: string, cause: unknown) {
    const code: SaveErrorCode = PERMISSION_CODES.has(errorCode(cause) ?? "") ? "permission-denied" : "io";
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(
      code === "permission-denied" ? `No permission to write ${filePath}: ${detail}` : `Failed to write ${filePath}: ${detail}`,
      { cause }
    );
    this.name = "SaveError";
    this.code = code;
    this.filePath = filePath;
  }
}

export class LoadError extends Error {
  readonly filePath: string;

  constructor(filePath: string, cause: unknown) {
    const detail = cause instanceof Error ? cause.message : String(cause);
    super(`Failed to read ${filePath}: ${detail}`, { cause });
    this.name = "LoadError";
    this.filePath = filePath;
  }
}

export const createFsStorage = (): AnnotationStorage => ({
  readText: async (filePath) => {
    try {
      return await fs.readFile(filePath, "utf-8");
    } catch (error) {
      if (errorCode(error) === "ENOENT") return null;
      throw error;
    }
  },

  writeText: async (filePath, content) => {
    await fs.writeFile(filePath, content, "utf-8");
  },
});
