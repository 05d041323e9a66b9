import { Router, type NextFunction, type Request, type RequestHandler, type Response } from "express";
import multer from "multer";

import { ExtractionError, errorMessage } from "../errors";
import type { TextExtractor } from "../services/pdfText";
import { toAnalysisResponse, type AnalysisRequest, type PipelineOutcome } from "../types";
import { extFromFilename, isPlainObject, safeStr } from "../utils/text";

export interface Analyzer {
  analyze(req: AnalysisRequest): Promise<PipelineOutcome>;
}

export type AnalyzeRouteDeps = {
  analyzer: Analyzer;
  extractor: TextExtractor;
  maxUploadBytes: number;
};

const PDF_MIME = "application/pdf";

export function sendError(res: Response, status: number, error: string, message: string, extra: Record<string, unknown> = {}): void {
  res.status(status).json({ ok: false, error, message, ...extra });
}

// ✅ Wrap multer so errors become JSON (no HTML)
function resumeUpload(maxBytes: number): RequestHandler {
  const upload = multer({
    storage: multer.memoryStorage(),
    limits: { fileSize: maxBytes, files: 1 },
  }).single("resume");

  return (req: Request, res: Response, next: NextFunction) => {
    upload(req, res, (err: unknown) => {
      if (!err) {
        next();
        return;
      }

      if (err instanceof multer.MulterError && err.code === "LIMIT_FILE_SIZE") {
        sendError(res, 413, "payload_too_large", "File too large", { maxBytes });
        return;
      }
      sendError(res, 400, "multipart_failed", errorMessage(err));
    });
  };
}

export function analyzeRouter(deps: AnalyzeRouteDeps): Router {
  const router = Router();

  router.post("/analyze", resumeUpload(deps.maxUploadBytes), async (req: Request, res: Response): Promise<void> => {
    try {
      const body: unknown = req.body;
      const jdRaw = isPlainObject(body) ? body.job_description : undefined;

      if (typeof jdRaw !== "string") {
        console.warn("⚠️ ANALYZE_REJECTED: job description missing");
        sendError(res, 400, "missing_job_description", "Job description is required");
        return;
      }

      const file = req.file;
      if (!file) {
        console.warn("⚠️ ANALYZE_REJECTED: resume file missing");
        sendError(res, 400, "missing_resume", "Resume file is required");
        return;
      }

      const jobDescription = jdRaw.trim();
      if (!jobDescription) {
        console.warn("⚠️ ANALYZE_REJECTED: empty job description");
        sendError(res, 400, "empty_job_description", "Job description cannot be empty");
        return;
      }

      const filename = safeStr(file.originalname);
      if (!filename) {
        console.warn("⚠️ ANALYZE_REJECTED: no resume file selected");
        sendError(res, 400, "missing_resume", "No resume file selected");
        return;
      }

      const ext = extFromFilename(filename);
      if (ext !== "pdf" || (file.mimetype && file.mimetype !== PDF_MIME && file.mimetype !== "application/octet-stream")) {
        console.warn("⚠️ ANALYZE_REJECTED: unsupported file", filename, file.mimetype);
        sendError(res, 415, "unsupported_file_type", "Only PDF files are supported", {
          filename,
          ext: ext || "unknown",
          allowed: ["pdf"],
        });
        return;
      }

      console.log("📥 ANALYZE_REQUEST:", filename, `${file.size} bytes`);

      let resumeText: string;
      try {
        resumeText = await deps.extractor.extract(file.buffer, filename);
      } catch (e: unknown) {
        if (e instanceof ExtractionError) {
          console.warn("⚠️ EXTRACT_FAILED:", filename, e.message);
          sendError(res, 422, "pdf_extraction_failed", "Could not read the PDF file. Please upload a valid PDF.");
          return;
        }
        throw e;
      }

      if (!resumeText.trim()) {
        console.warn("⚠️ EXTRACT_EMPTY:", filename);
        sendError(
          res,
          400,
          "empty_resume_text",
          "Could not extract text from PDF. Please ensure the PDF contains readable text."
        );
        return;
      }
      console.log(`📄 EXTRACTED ${resumeText.length} chars from ${filename}`);

      const outcome = await deps.analyzer.analyze({ resumeText, jobDescription });

      switch (outcome.kind) {
        case "success":
        case "fallback":
          console.log(`✅ ANALYZE_DONE (${outcome.kind}, attempts=${outcome.attempts}):`, outcome.result.matchPercentage);
          res.json(toAnalysisResponse(outcome.result));
          return;
        case "fatal":
          if (outcome.error === "invalid_input") {
            sendError(res, 400, "invalid_input", outcome.message);
            return;
          }
          sendError(res, 500, "analysis_failed", "Analysis failed. Please try again later.");
          return;
      }
    } catch (e: unknown) {
      console.error("❌ ANALYZE_FAILED:", errorMessage(e));
      sendError(res, 500, "analysis_failed", "Analysis failed. Please try again later.");
    }
  });

  return router;
}
