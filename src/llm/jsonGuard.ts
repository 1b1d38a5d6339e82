import { jsonrepair } from "jsonrepair";
import { LLMDecodeError } from "./errors";

/** Strips a surrounding Markdown code fence, with or without a language tag. */
export function normalizeRawJson(rawText: string): string {
  const trimmed = rawText.trim();
  if (!trimmed.startsWith("```")) {
    return trimmed;
  }

  const lines = trimmed.split(/\r?\n/);
  if (lines.length < 3) {
    return trimmed;
  }

  const firstLine = lines[0].trim();
  const lastLine = lines[lines.length - 1].trim();

  if (!firstLine.startsWith("```") || !lastLine.startsWith("```")) {
    return trimmed;
  }

  return lines.slice(1, -1).join("\n").trim();
}

/**
 * Candidate JSON spans in the text, most likely first. Prose around the payload is cut,
 * e.g. `Here you go: {...} Let me know!`. The outermost object span is tried before the
 * array span, so bracketed prose ahead of an object does not hide it.
 */
export function jsonBlockCandidates(text: string): string[] {
  if (text.startsWith("{") || text.startsWith("[")) {
    return [text];
  }

  const candidates = [span(text, "{", "}"), span(text, "[", "]")].filter(
    (candidate): candidate is string => candidate !== undefined
  );
  return candidates.length > 0 ? candidates : [text];
}

/**
 * True when a string or bracket is left open at the end of the text. Repairing such
 * output would invent the missing tail.
 */
export function isTruncatedJson(text: string): boolean {
  const open: string[] = [];
  let quote: string | undefined;
  let escaped = false;

  for (const char of text) {
    if (quote !== undefined) {
      if (escaped) {
        escaped = false;
      } else if (char === "\\") {
        escaped = true;
      } else if (char === quote) {
        quote = undefined;
      }
      continue;
    }

    if (char === '"' || char === "'") {
      quote = char;
    } else if (char === "{" || char === "[") {
      open.push(char);
    } else if (char === "}" || char === "]") {
      open.pop();
    }
  }

  return quote !== undefined || open.length > 0;
}

export function parseLLMJson(rawText: string): unknown {
  const normalized = normalizeRawJson(rawText);
  if (!normalized) {
    throw new LLMDecodeError("LLM output is empty");
  }

  const candidates = jsonBlockCandidates(normalized);
  for (const candidate of candidates) {
    try {
      return JSON.parse(candidate);
    } catch {
      continue;
    }
  }

  if (candidates.every(isTruncatedJson)) {
    throw new LLMDecodeError("LLM output is truncated");
  }

  for (const candidate of candidates.filter((item) => !isTruncatedJson(item))) {
    try {
      return JSON.parse(jsonrepair(candidate));
    } catch {
      continue;
    }
  }
  throw new LLMDecodeError("LLM output JSON.parse failed");
}

function span(text: string, opening: string, closing: string): string | undefined {
  const start = text.indexOf(opening);
  const end = text.lastIndexOf(closing);
  return start >= 0 && end > start ? text.slice(start, end + 1) : undefined;
}
