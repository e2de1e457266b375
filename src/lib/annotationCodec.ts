import { isClassIdToken, type ClassRegistry } from "@/lib/classRegistry";
import type { Box } from "@/types/annotation";

export const DEFAULT_PRECISION = 6;

const FIELD_COUNT = 5;
const DECIMAL = /^[-+]?(\d+\.?\d*|\.\d+)([eE][-+]?\d+)?$/;

export type AnnotationParseIssue = {
  // 1-based
  line: number;
  content: string;
  reason: string;
};

export type ParsedAnnotations = {
  boxes: Box[];
  issues: AnnotationParseIssue[];
};

const parseDecimal = (value: string) => {
  if (!DECIMAL.test(value)) return undefined;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : undefined;
};

/**
 * Parses a per-image label file: one `<class_token> <cx> <cy> <w> <h>` per line.
 * Bad lines are skipped and reported; the rest still load. Class tokens are
 * resolved through the registry, which may grow as a result.
 */
export const parseAnnotations = (text: string, registry: ClassRegistry): ParsedAnnotations => {
  const boxes: Box[] = [];
  const issues: AnnotationParseIssue[] = [];

  text.split(/\r?\n/).forEach((raw, index) => {
    const content = raw.trim();
    if (!content) return;

    const report = (reason: string) => issues.push({ line: index + 1, content, reason });
    const fields = content.split(/\s+/);
    if (fields.length !== FIELD_COUNT) {
      report(`expected ${FIELD_COUNT} fields, found ${fields.length}`);
      return;
    }

    const [token, ...geometry] = fields;
    const values = geometry.map(parseDecimal);
    const badField = values.findIndex((value) => value === undefined);
    if (badField !== -1) {
      report(`field ${badField + 2} is not a number: "${geometry[badField]}"`);
      return;
    }
    const [cx, cy, w, h] = values.map((value) => value ?? 0);

    if (DECIMAL.test(token) && !isClassIdToken(token)) {
      report(`class id must be a non-negative integer: "${token}"`);
      return;
    }

    let classId: number;
    try {
      classId = registry.resolve(token);
    } catch (error) {
      report(error instanceof Error ? error.message : String(error));
      return;
    }

    boxes.push({ classId, cx, cy, w, h });
  });

  return { boxes, issues };
};

export const formatBoxLine = (box: Box, precision: number = DEFAULT_PRECISION) => {
  return [box.classId, box.cx.toFixed(precision), box.cy.toFixed(precision), box.w.toFixed(precision), box.h.toFixed(precision)].join(" ");
};

export const serializeAnnotations = (boxes: readonly Box[], precision: number = DEFAULT_PRECISION) => {
  return boxes.map((box) => `${formatBoxLine(box, precision)}\n`).join("");
};

// Interior blank lines are kept so that line index keeps matching class id
export const parseClassList = (text: string): string[] => {
  const lines = text.split(/\r?\n/).map((line) => line.trim());
  while (lines.length > 0 && lines[lines.length - 1] === "") {
    lines.pop();
  }
  return lines;
};

export const serializeClassList = (names: readonly string[]) => {
  return names.map((name) => `${name}\n`).join("");
};
