import { describe, expect, it } from "vitest";
import { ExtractionError } from "../src/errors";
import { PdfTextExtractor, looksGarbledText } from "../src/services/pdfText";

describe("looksGarbledText", () => {
  it("flags empty and symbol-only text", () => {
    expect(looksGarbledText("")).toBe(true);
    expect(looksGarbledText("§¶ 12 34 56 78 90 !! ?? ## $$ %% && ** ((")).toBe(true);
  });

  it("accepts ordinary resume text", () => {
    expect(looksGarbledText("Senior Python Developer, 5 years of Flask and Docker")).toBe(false);
  });
});

describe("PdfTextExtractor", () => {
  it("raises ExtractionError for bytes that are not a PDF", async () => {
    const extractor = new PdfTextExtractor();
    await expect(extractor.extract(Buffer.from("this is not a pdf"), "fake.pdf")).rejects.toBeInstanceOf(ExtractionError);
  });
});
