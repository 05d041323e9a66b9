import pdfParse from "pdf-parse/lib/pdf-parse.js";

import { ExtractionError, errorMessage } from "../errors";
import { safeStr } from "../utils/text";

export interface TextExtractor {
  /** Resolves to "" when the document holds no readable text. */
  extract(buffer: Buffer, filename: string): Promise<string>;
}

export function looksGarbledText(s: string): boolean {
  const sample = (s || "").slice(0, 2000);
  const trimmed = sample.trim();
  if (!trimmed) return true;
  const letters = (trimmed.match(/[A-Za-z]/g) || []).length;
  const ratio = letters / Math.max(trimmed.length, 1);
  return ratio < 0.05;
}

export class PdfTextExtractor implements TextExtractor {
  async extract(buffer: Buffer, filename: string): Promise<string> {
    let text: string;
    try {
      const parsed = await pdfParse(buffer);
      text = safeStr(parsed.text).replace(/\u0000/g, "");
    } catch (e: unknown) {
      throw new ExtractionError(`PDF processing error: ${errorMessage(e)}`, { cause: e });
    }

    if (looksGarbledText(text)) {
      console.warn("⚠️ EXTRACT_GARBLED:", filename);
      return "";
    }
    return text;
  }
}
