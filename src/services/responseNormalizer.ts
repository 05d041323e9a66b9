import { UnparsableResponse } from "../errors";
import { MATCH_SENTINEL, type AnalysisResult } from "../types";
import { isPlainObject, safeStr, tryJsonParse } from "../utils/text";

// ============================
// Field aliases
// ============================
export type FieldName = "match" | "keywords" | "summary";

export type RawFields = Partial<Record<FieldName, unknown>>;

const FIELDS: FieldName[] = ["match", "keywords", "summary"];

/** Normalized (lowercase, alphanumerics only) key variants, in priority order. */
export const FIELD_ALIASES: Record<FieldName, readonly string[]> = {
  match: ["jdmatch", "matchpercentage", "percentagematch", "jdmatchpercentage", "matchscore", "match"],
  keywords: ["missingkeywords", "keywordsmissing", "missingskills", "keywords"],
  summary: ["profilesummary", "candidatesummary", "summary"],
};

const ALIAS_TO_FIELD = new Map<string, FieldName>(
  FIELDS.flatMap((field) => FIELD_ALIASES[field].map((alias): [string, FieldName] => [alias, field]))
);

export function normKey(key: string): string {
  return key.toLowerCase().replace(/[^a-z0-9]/g, "");
}

function fieldsFromObject(obj: Record<string, unknown>): RawFields {
  const byKey = new Map<string, unknown>();
  for (const [k, v] of Object.entries(obj)) {
    const nk = normKey(k);
    if (!byKey.has(nk)) byKey.set(nk, v);
  }

  const out: RawFields = {};
  for (const field of FIELDS) {
    const alias = FIELD_ALIASES[field].find((a) => byKey.has(a));
    if (alias !== undefined) out[field] = byKey.get(alias);
  }
  return out;
}

// ============================
// Pre-cleaning
// ============================
const FENCED = /^(`{3,}|~{3,})[\w.+-]*[ \t]*\r?\n?([\s\S]*?)\r?\n?\1[ \t]*$/;
const OPEN_FENCE = /^(`{3,}|~{3,})[^\n]*\n?/;

/** Removes a fenced code block wrapped around the whole text, keeping its interior. */
export function stripCodeFence(text: string): string {
  const trimmed = text.trim();
  const m = trimmed.match(FENCED);
  if (m) return m[2].trim();
  // reply cut off before the closing fence
  if (OPEN_FENCE.test(trimmed)) return trimmed.replace(OPEN_FENCE, "").trim();
  return trimmed;
}

function bracketSlice(text: string): string | null {
  const start = text.indexOf("{");
  const end = text.lastIndexOf("}");
  if (start === -1 || end <= start) return null;
  return text.slice(start, end + 1);
}

function parseObject(s: string): Record<string, unknown> | null {
  const parsed = tryJsonParse(s);
  return isPlainObject(parsed) ? parsed : null;
}

// ============================
// Extraction strategies
// ============================
export type StrategyName = "bracket" | "strict" | "relaxed" | "scan";

export type ExtractionAttempt = {
  strategy: StrategyName;
  fields: RawFields;
  /** Share of the three fields the strategy found, 0..1. */
  confidence: number;
};

type Strategy = {
  name: StrategyName;
  extract(text: string): RawFields | null;
};

const bracketStrategy: Strategy = {
  name: "bracket",
  extract(text) {
    const slice = bracketSlice(text);
    const obj = slice === null ? null : parseObject(slice);
    return obj ? fieldsFromObject(obj) : null;
  },
};

const strictStrategy: Strategy = {
  name: "strict",
  extract(text) {
    const obj = parseObject(text);
    return obj ? fieldsFromObject(obj) : null;
  },
};

const relaxedStrategy: Strategy = {
  name: "relaxed",
  extract(text) {
    const base = bracketSlice(text) ?? text;
    const noTrailingCommas = base.replace(/,\s*([}\]])/g, "$1");
    const obj = parseObject(noTrailingCommas) ?? parseObject(noTrailingCommas.replace(/'/g, '"'));
    return obj ? fieldsFromObject(obj) : null;
  },
};

// Inside a broken object a key may follow "{" or ","; in plain text only a line start counts,
// so a comma in a prose sentence never opens a field.
const OBJECT_KEY_PATTERN = /(?:^|[{,\n])[ \t*#-]*["']?([A-Za-z][A-Za-z _-]{0,40}?)["'*]*[ \t]*[:=]/g;
const LINE_KEY_PATTERN = /(?:^|\n)[ \t*#-]*["']?([A-Za-z][A-Za-z _-]{0,40}?)["'*]*[ \t]*[:=]/g;

function readQuoted(segment: string, quote: string): string {
  let i = 1;
  while (i < segment.length) {
    const ch = segment[i];
    if (ch === "\\") {
      i += 2;
      continue;
    }
    if (ch === quote) break;
    i += 1;
  }

  if (i >= segment.length) {
    // unterminated: reply was truncated mid-value
    return segment.slice(1).replace(/["'}\]\s,]+$/, "").trim();
  }

  const inner = segment.slice(1, i);
  if (quote === '"') {
    const decoded = tryJsonParse(`"${inner}"`);
    if (typeof decoded === "string") return decoded;
  }
  return inner;
}

function readList(segment: string): string[] {
  const close = segment.indexOf("]");
  const body = close === -1 ? segment.slice(1) : segment.slice(1, close);

  if (close !== -1) {
    const parsed = tryJsonParse(segment.slice(0, close + 1));
    if (Array.isArray(parsed)) return parsed.map((item) => safeStr(item));
  }

  return body
    .split(",")
    .map((item) => item.trim().replace(/^["']|["']$/g, "").trim())
    .filter(Boolean);
}

function readScannedValue(segment: string): unknown {
  const s = segment.trim();
  if (!s) return undefined;
  if (s.startsWith('"') || s.startsWith("'")) return readQuoted(s, s[0]);
  if (s.startsWith("[")) return readList(s);

  const firstLine = s.split(/\r?\n/)[0] ?? "";
  const value = firstLine.replace(/[,}\s]+$/, "").trim();
  return value || undefined;
}

/** Key-by-key scan for replies that are not valid JSON (truncated, YAML-ish, prose with labels). */
const scanStrategy: Strategy = {
  name: "scan",
  extract(text) {
    const found: Array<{ field: FieldName; keyStart: number; valueStart: number }> = [];
    const seen = new Set<FieldName>();

    const pattern = text.includes("{") ? OBJECT_KEY_PATTERN : LINE_KEY_PATTERN;
    for (const m of text.matchAll(pattern)) {
      const field = ALIAS_TO_FIELD.get(normKey(m[1]));
      if (!field || seen.has(field) || m.index === undefined) continue;
      seen.add(field);
      found.push({ field, keyStart: m.index, valueStart: m.index + m[0].length });
    }

    if (found.length === 0) return null;

    const out: RawFields = {};
    found.forEach((entry, idx) => {
      const next = found[idx + 1];
      const segment = text.slice(entry.valueStart, next ? next.keyStart : text.length);
      const value = readScannedValue(segment);
      if (value !== undefined) out[entry.field] = value;
    });
    return out;
  },
};

const STRATEGIES: readonly Strategy[] = [bracketStrategy, strictStrategy, relaxedStrategy, scanStrategy];

function confidenceOf(fields: RawFields): number {
  return FIELDS.filter((f) => fields[f] !== undefined).length / FIELDS.length;
}

/**
 * Runs the strategy chain and returns the first attempt that yields anything.
 * A parsed object is authoritative: the key scan only runs when no JSON parse succeeded.
 */
export function extractFields(text: string): ExtractionAttempt | null {
  for (const strategy of STRATEGIES) {
    const fields = strategy.extract(text);
    if (fields) return { strategy: strategy.name, fields, confidence: confidenceOf(fields) };
  }
  return null;
}

// ============================
// Coercion
// ============================
const NUMERIC_MATCH = /^([+-]?\d+(?:\.\d+)?)\s*(%?)$/;

function inPercentRange(n: number): boolean {
  return Number.isFinite(n) && n >= 0 && n <= 100;
}

/** Numbers and numeric strings share one rule; anything outside 0..100 is the sentinel. */
export function coerceMatch(value: unknown): string {
  if (typeof value === "number") {
    return inPercentRange(value) ? `${Math.round(value)}%` : MATCH_SENTINEL;
  }
  if (typeof value !== "string") return MATCH_SENTINEL;

  const s = value.trim();
  const m = s.match(NUMERIC_MATCH);
  if (!m || !inPercentRange(Number(m[1]))) return MATCH_SENTINEL;
  // already suffixed values are kept as given
  return m[2] ? s : `${Math.round(Number(m[1]))}%`;
}

export function coerceKeywords(value: unknown): string[] {
  if (Array.isArray(value)) {
    return value
      .filter((item) => typeof item === "string" || typeof item === "number")
      .map((item) => String(item).trim())
      .filter(Boolean);
  }
  if (typeof value === "string") {
    return value
      .split(",")
      .map((item) => item.trim())
      .filter(Boolean);
  }
  return [];
}

export function coerceSummary(value: unknown): string {
  if (typeof value === "string") return value.trim();
  if (typeof value === "number" || typeof value === "boolean") return String(value);
  return "";
}

// ============================
// Normalize
// ============================
export type ViabilityPolicy = (result: AnalysisResult) => boolean;

export const atLeastOneMeaningfulField: ViabilityPolicy = (r) =>
  r.matchPercentage !== MATCH_SENTINEL || r.missingKeywords.length > 0 || r.profileSummary !== "";

export type NormalizeOptions = {
  isViable?: ViabilityPolicy;
};

export type Normalizer = (rawText: string) => AnalysisResult;

export function normalize(rawText: string, opts: NormalizeOptions = {}): AnalysisResult {
  const isViable = opts.isViable ?? atLeastOneMeaningfulField;
  const text = stripCodeFence(rawText);
  const attempt = extractFields(text);
  const fields = attempt?.fields ?? {};

  const result: AnalysisResult = {
    matchPercentage: coerceMatch(fields.match),
    missingKeywords: coerceKeywords(fields.keywords),
    profileSummary: coerceSummary(fields.summary),
  };

  if (!isViable(result)) {
    throw new UnparsableResponse(
      attempt ? `No usable fields in AI response (strategy: ${attempt.strategy})` : "AI response contains no recognizable result"
    );
  }
  return result;
}
