import { promises as fs } from "node:fs";
import { DEFAULT_PRECISION } from "@/lib/annotationCodec";
import { DEFAULT_UNDO_CAPACITY } from "@/lib/undoStack";

export type EditorSettings = {
  // screen pixels
  clickTolerance: number;
  minBoxPixels: number;
  undoCapacity: number;
  precision: number;
  classFileName: string;
  defaultClasses: string[];
  autoSaveOnNavigate: boolean;
};

export const MIN_HANDLE_RADIUS = 6;

// Corner handles use the click tolerance, never smaller than the floor
export const handleRadiusFor = ({ clickTolerance }: EditorSettings) => Math.max(clickTolerance, MIN_HANDLE_RADIUS);

export const DEFAULT_SETTINGS: EditorSettings = {
  clickTolerance: 8,
  minBoxPixels: 6,
  undoCapacity: DEFAULT_UNDO_CAPACITY,
  precision: DEFAULT_PRECISION,
  classFileName: "_darknet.labels",
  defaultClasses: ["object"],
  autoSaveOnNavigate: false,
};

export type SettingsResult = {
  settings: EditorSettings;
  warnings: string[];
};

const ENV_KEYS = {
  clickTolerance: "ANNOTATOR_CLICK_TOLERANCE",
  minBoxPixels: "ANNOTATOR_MIN_BOX_PIXELS",
  undoCapacity: "ANNOTATOR_UNDO_CAPACITY",
  precision: "ANNOTATOR_PRECISION",
  classFileName: "ANNOTATOR_CLASS_FILE",
  autoSaveOnNavigate: "ANNOTATOR_AUTOSAVE",
} as const;

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === "object" && value !== null && !Array.isArray(value);

/**
 * Merges user-provided settings over the defaults. Fields of the wrong type or
 * out of range keep their default and are listed in `warnings`.
 */
export const resolveSettings = (raw: unknown): SettingsResult => {
  const settings: EditorSettings = { ...DEFAULT_SETTINGS, defaultClasses: [...DEFAULT_SETTINGS.defaultClasses] };
  const warnings: string[] = [];
  if (raw === undefined || raw === null) return { settings, warnings };
  if (!isRecord(raw)) {
    warnings.push("settings must be an object");
    return { settings, warnings };
  }

  const reject = (key: string) => warnings.push(`invalid value for "${key}", using default`);

  const readNumber = (key: "clickTolerance" | "minBoxPixels", min: number) => {
    const value = raw[key];
    if (value === undefined) return;
    if (typeof value === "number" && Number.isFinite(value) && value >= min) {
      settings[key] = value;
    } else {
      reject(key);
    }
  };

  const readInteger = (key: "undoCapacity" | "precision", min: number, max: number) => {
    const value = raw[key];
    if (value === undefined) return;
    if (typeof value === "number" && Number.isInteger(value) && value >= min && value <= max) {
      settings[key] = value;
    } else {
      reject(key);
    }
  };

  readNumber("clickTolerance", 0);
  readNumber("minBoxPixels", 1);
  readInteger("undoCapacity", 1, 10000);
  readInteger("precision", 1, 12);

  if (raw.classFileName !== undefined) {
    if (typeof raw.classFileName === "string" && raw.classFileName.trim() && !/[\\/]/.test(raw.classFileName)) {
      settings.classFileName = raw.classFileName.trim();
    } else {
      reject("classFileName");
    }
  }

  if (raw.defaultClasses !== undefined) {
    const classes = raw.defaultClasses;
    if (Array.isArray(classes) && classes.length > 0 && classes.every((name): name is string => typeof name === "string" && name.trim() !== "")) {
      settings.defaultClasses = classes.map((name) => name.trim());
    } else {
      reject("defaultClasses");
    }
  }

  if (raw.autoSaveOnNavigate !== undefined) {
    if (typeof raw.autoSaveOnNavigate === "boolean") {
      settings.autoSaveOnNavigate = raw.autoSaveOnNavigate;
    } else {
      reject("autoSaveOnNavigate");
    }
  }

  return { settings, warnings };
};

const parseEnvBoolean = (value: string) => {
  const normalized = value.trim().toLowerCase();
  if (["1", "true", "yes", "on"].includes(normalized)) return true;
  if (["0", "false", "no", "off"].includes(normalized)) return false;
  return value;
};

const parseEnvNumber = (value: string) => {
  const parsed = Number(value.trim());
  return value.trim() && Number.isFinite(parsed) ? parsed : value;
};

export const settingsFromEnv = (env: NodeJS.ProcessEnv = process.env, base: unknown = {}): SettingsResult => {
  const raw: Record<string, unknown> = isRecord(base) ? { ...base } : {};

  const numericKeys = ["clickTolerance", "minBoxPixels", "undoCapacity", "precision"] as const;
  numericKeys.forEach((key) => {
    const value = env[ENV_KEYS[key]];
    if (value !== undefined) raw[key] = parseEnvNumber(value);
  });

  const classFile = env[ENV_KEYS.classFileName];
  if (classFile !== undefined) raw.classFileName = classFile;

  const autoSave = env[ENV_KEYS.autoSaveOnNavigate];
  if (autoSave !== undefined) raw.autoSaveOnNavigate = parseEnvBoolean(autoSave);

  return resolveSettings(raw);
};

/** Reads settings from a JSON file; a missing file yields the defaults. */
export const loadSettingsFile = async (filePath: string): Promise<SettingsResult> => {
  let text: string;
  try {
    text = await fs.readFile(filePath, "utf-8");
  } catch (error) {
    if (isRecord(error) && error.code === "ENOENT") {
      return resolveSettings(undefined);
    }
    throw error;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    throw new Error(`Settings file ${filePath} is not valid JSON`, { cause: error });
  }
  return resolveSettings(parsed);
};
