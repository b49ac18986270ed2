/**
 * Structured output handling: finds the JSON value in a model reply and validates it with Zod.
 */

import type { z } from "zod";
import { GatewayError } from "./types.js";

export const JSON_ONLY_INSTRUCTION =
  "You must respond with ONLY a valid JSON object. No markdown, no code fences, no explanatory text before or after.";

const SNIPPET_MAX = 400;

function snippet(text: string): string {
  const s = text.trim();
  if (s.length <= SNIPPET_MAX) return s;
  return s.slice(0, SNIPPET_MAX) + "...";
}

function stripMarkdownFences(text: string): string {
  const s = text.trim();
  const fence = /^```(?:json)?\s*\n?([\s\S]*?)\n?```\s*$/;
  const m = s.match(fence);
  if (m) return m[1].trim();
  const open = s.indexOf("```");
  if (open >= 0) {
    const after = s.slice(open + 3).replace(/^json\s*/i, "");
    const close = after.indexOf("```");
    if (close >= 0) return after.slice(0, close).trim();
    return after.trim();
  }
  return s;
}

/**
 * Extracts the first complete JSON value (object or array) by tracking balanced braces,
 * nesting depth for {} and [], and string mode for double quotes with backslash escapes.
 */
export function extractFirstJsonValue(text: string): string {
  const stripped = stripMarkdownFences(text);
  const first = stripped[0];
  if (first === "{" || first === "[") {
    try {
      JSON.parse(stripped);
      return stripped;
    } catch {
      /* not a single value; scan below */
    }
  }
  const objStart = stripped.indexOf("{");
  const arrStart = stripped.indexOf("[");
  if (objStart < 0 && arrStart < 0) {
    throw new GatewayError(`LLM response missing structured payload. Output: ${snippet(text)}`);
  }
  const start = arrStart < 0 || (objStart >= 0 && objStart < arrStart) ? objStart : arrStart;
  let depthObj = 0;
  let depthArr = 0;
  let inString = false;
  let escape = false;
  for (let i = start; i < stripped.length; i++) {
    const c = stripped[i];
    if (escape) {
      escape = false;
      continue;
    }
    if (inString) {
      if (c === "\\") escape = true;
      else if (c === '"') inString = false;
      continue;
    }
    if (c === '"') inString = true;
    else if (c === "{") depthObj++;
    else if (c === "}") depthObj--;
    else if (c === "[") depthArr++;
    else if (c === "]") depthArr--;
    if (depthObj === 0 && depthArr === 0) return stripped.slice(start, i + 1);
  }
  throw new GatewayError(`Incomplete JSON (unbalanced braces). Output: ${snippet(text)}`);
}

/** Parses and validates a model reply; every failure surfaces as GatewayError. */
export function parseStructuredOutput<T>(text: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>): T {
  if (!text.trim()) {
    throw new GatewayError("LLM response missing structured payload");
  }
  const extracted = extractFirstJsonValue(text);
  let value: unknown;
  try {
    value = JSON.parse(extracted);
  } catch (e) {
    const msg = e instanceof Error ? e.message : String(e);
    throw new GatewayError(`JSON parse failed: ${msg}. Output: ${snippet(text)}`, { cause: e });
  }
  const validated = schema.safeParse(value);
  if (!validated.success) {
    const issues = validated.error.issues.map((i) => ({ path: i.path, message: i.message }));
    throw new GatewayError(
      `Schema validation failed: ${JSON.stringify({ issues })}. Output: ${snippet(text)}`,
      { cause: validated.error }
    );
  }
  return validated.data;
}
