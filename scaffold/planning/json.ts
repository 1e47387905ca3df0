import type { ChatResponse } from "../providers/types";

/**
 * Parse a model reply as JSON, tolerating markdown fences around it.
 */
export function parseModelJson(response: ChatResponse, label: string): unknown {
  const text = response.textBlocks.join("");
  // Strip markdown fences if the model added them anyway
  const jsonText = text
    .replace(/```json\s*/g, "")
    .replace(/```\s*/g, "")
    .trim();

  try {
    return JSON.parse(jsonText);
  } catch {
    throw new Error(`${label} returned invalid JSON:\n${text}`);
  }
}

/**
 * Optional list of non-blank strings, trimmed and de-duplicated. Also accepts
 * a comma-separated string.
 */
export function readStringList(
  value: unknown,
  field: string,
  where: string
): string[] | undefined {
  if (value === undefined || value === null) return undefined;
  const items = typeof value === "string" ? value.split(",") : value;
  if (!Array.isArray(items) || items.some((item) => typeof item !== "string")) {
    throw new Error(`${where} has invalid "${field}"; expected string[]`);
  }
  const trimmed = items
    .map((item: string) => item.trim())
    .filter((item) => item !== "");
  return Array.from(new Set(trimmed));
}

export function readOptionalString(
  value: unknown,
  field: string,
  where: string
): string | undefined {
  if (value === undefined || value === null) return undefined;
  if (typeof value !== "string") {
    throw new Error(`${where} has invalid "${field}"; expected string`);
  }
  const trimmed = value.trim();
  return trimmed === "" ? undefined : trimmed;
}
