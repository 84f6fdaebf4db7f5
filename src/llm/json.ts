import type { z } from "zod";
import { logger } from "../core/logger";
import { LLMError } from "../core/errors";
import { normalizeWhitespace } from "../core/normalize";

export function stripCodeFence(raw: string): string {
  let text = raw.trim();
  if (!text.startsWith("```")) return text;

  const lines = text.split("\n");
  if (lines[0] && lines[0].startsWith("```")) {
    lines.shift();
  }
  const lastLine = lines[lines.length - 1];
  if (lastLine && lastLine.trim().startsWith("```")) {
    lines.pop();
  }
  text = lines.join("\n").trim();
  return text;
}

/**
 * Finds the first balanced JSON object or array in model output and parses
 * it. Returns undefined when nothing parses.
 */
export function extractJsonPayload(raw: string, kind: "object" | "array"): unknown {
  const text = stripCodeFence(raw);
  const open = kind === "object" ? "{" : "[";
  const close = kind === "object" ? "}" : "]";

  let start = text.indexOf(open);
  while (start !== -1) {
    const end = findClosing(text, start, open, close);
    if (end !== -1) {
      try {
        return JSON.parse(text.slice(start, end + 1));
      } catch (error) {
        logger.trace({ error, start }, "Candidate JSON payload did not parse");
      }
    }
    start = text.indexOf(open, start + 1);
  }
  return undefined;
}

function findClosing(text: string, start: number, open: string, close: string): number {
  let depthCount = 0;
  let inString = false;
  let escaped = false;

  for (let i = start; i < text.length; i++) {
    const ch = text[i];
    if (inString) {
      if (escaped) escaped = false;
      else if (ch === "\\") escaped = true;
      else if (ch === '"') inString = false;
      continue;
    }
    if (ch === '"') inString = true;
    else if (ch === open) depthCount++;
    else if (ch === close) {
      depthCount--;
      if (depthCount === 0) return i;
    }
  }
  return -1;
}

export function parseAndValidate<T>(rawContent: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): T {
  const parsed = extractJsonPayload(rawContent, "object");
  if (parsed === undefined) {
    logger.error({ rawContent }, "Failed to parse LLM response as JSON");
    throw new LLMError("Failed to parse response as JSON", "parse_error");
  }

  const result = schema.safeParse(parsed);
  if (!result.success) {
    logger.debug({ error: result.error.message, parsed }, "LLM response validation failed");
    throw new LLMError(`Response validation failed: ${result.error.message}`, "validation_error");
  }
  return result.data;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function pickString(source: Record<string, unknown>, ...keys: string[]): string | undefined {
  for (const key of keys) {
    const value = source[key];
    if (typeof value === "string") {
      const cleaned = normalizeWhitespace(value);
      if (cleaned.length > 0) return cleaned;
    } else if (typeof value === "number" && Number.isFinite(value)) {
      return String(value);
    }
  }
  return undefined;
}

export function pickBoolean(source: Record<string, unknown>, ...keys: string[]): boolean | undefined {
  for (const key of keys) {
    const value = source[key];
    if (typeof value === "boolean") return value;
    if (typeof value === "number") return value !== 0;
    if (typeof value === "string") {
      const lowered = value.trim().toLowerCase();
      if (["true", "yes", "1"].includes(lowered)) return true;
      if (["false", "no", "0"].includes(lowered)) return false;
    }
  }
  return undefined;
}

/** Accepts a bare array or an object wrapping one under any of `keys`. */
export function pickArray(payload: unknown, ...keys: string[]): unknown[] {
  if (Array.isArray(payload)) return payload;
  if (!isRecord(payload)) return [];
  for (const key of keys) {
    const value = payload[key];
    if (Array.isArray(value)) return value;
  }
  return [];
}
