export function parseJsonFromModelText(raw: string): unknown {
  const trimmed = raw.trim();
  if (!trimmed) {
    throw new Error("Model returned an empty response.");
  }

  const fenced = extractFencedJson(trimmed);
  if (fenced) {
    try {
      return JSON.parse(fenced);
    } catch {
      // fall through to the unfenced attempts
    }
  }

  try {
    return JSON.parse(trimmed);
  } catch {
    const objectCandidate = extractDelimitedJson(trimmed, "{", "}");
    if (objectCandidate) {
      return JSON.parse(objectCandidate);
    }

    const arrayCandidate = extractDelimitedJson(trimmed, "[", "]");
    if (arrayCandidate) {
      return JSON.parse(arrayCandidate);
    }

    throw new Error("Model response did not contain valid JSON.");
  }
}

function extractFencedJson(text: string): string | null {
  const match = text.match(/```(?:json)?\s*([\s\S]*?)```/i);
  return match?.[1]?.trim() ?? null;
}

function extractDelimitedJson(text: string, start: string, end: string): string | null {
  const startIndex = text.indexOf(start);
  const endIndex = text.lastIndexOf(end);

  if (startIndex === -1 || endIndex === -1 || endIndex <= startIndex) {
    return null;
  }

  return text.slice(startIndex, endIndex + 1).trim();
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return Boolean(value) && typeof value === "object" && !Array.isArray(value);
}

export function asObject(value: unknown): Record<string, unknown> {
  if (!isRecord(value)) {
    throw new Error("Expected a JSON object.");
  }
  return value;
}

export function asString(value: unknown, fallback = ""): string {
  if (typeof value === "string") {
    return value.trim();
  }
  if (typeof value === "number" || typeof value === "boolean") {
    return String(value);
  }
  return fallback;
}

export function asStringArray(value: unknown): string[] {
  if (!Array.isArray(value)) {
    return [];
  }
  return value
    .map((item) => asString(item))
    .filter((item) => item.length > 0);
}

export function asObjectArray(value: unknown): Record<string, unknown>[] {
  if (!Array.isArray(value)) {
    return [];
  }

  return value.filter(isRecord);
}

export function asInteger(value: unknown): number | null {
  if (typeof value === "number" && Number.isFinite(value)) {
    return Math.trunc(value);
  }
  if (typeof value === "string" && /^\s*-?\d+\s*$/.test(value)) {
    return Number.parseInt(value, 10);
  }
  return null;
}

export function asBoolean(value: unknown): boolean {
  if (typeof value === "boolean") {
    return value;
  }
  if (typeof value === "string") {
    return ["true", "yes", "1"].includes(value.trim().toLowerCase());
  }
  return false;
}

/**
 * Reads the first present key, so model replies in either camelCase or snake_case are accepted.
 */
export function pick(record: Record<string, unknown>, ...keys: string[]): unknown {
  for (const key of keys) {
    if (record[key] !== undefined && record[key] !== null) {
      return record[key];
    }
  }
  return undefined;
}
