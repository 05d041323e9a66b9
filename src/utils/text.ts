// =======================================================
// TEXT / ENV UTILITIES
// =======================================================

export function safeStr(val: unknown): string {
  if (val === null || val === undefined) return "";
  return String(val).trim();
}

export function truthyStr(val: unknown): boolean {
  const v = safeStr(val).toLowerCase();
  return v === "1" || v === "true" || v === "yes" || v === "y" || v === "on";
}

export function tryJsonParse(s: string): unknown {
  try {
    return JSON.parse(s);
  } catch {
    return undefined;
  }
}

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function extFromFilename(filename: string): string {
  const base = safeStr(filename).toLowerCase();
  const i = base.lastIndexOf(".");
  return i >= 0 ? base.slice(i + 1) : "";
}

/** Keeps the first `max` characters. */
export function clampText(text: string, max: number): string {
  if (text.length <= max) return text;
  return text.slice(0, max);
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
