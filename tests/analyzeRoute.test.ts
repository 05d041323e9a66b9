import type { Server } from "node:http";
import axios, { type AxiosInstance } from "axios";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { createApp } from "../src/app";
import { loadConfig } from "../src/config";
import { ExtractionError, TransientModelError } from "../src/errors";
import { AnalysisPipeline } from "../src/services/analysisPipeline";
import type { TextExtractor } from "../src/services/pdfText";
import { FALLBACK_KEYWORD } from "../src/services/retryController";
import { ScriptedInvoker, noSleep } from "./stubs";

const RESUME = "Experienced Python developer with Flask and Docker";
const JD = "Looking for a Kubernetes and Python engineer";
const MODEL_REPLY = '{"JD Match": "70%", "MissingKeywords": ["kubernetes"], "Profile Summary": "Solid backend skills."}';

type Harness = {
  http: AxiosInstance;
  invoker: ScriptedInvoker;
  extracted: string[];
};

let server: Server | null = null;

async function start(opts: { script?: Array<string | Error>; extract?: () => Promise<string>; env?: Record<string, string> } = {}): Promise<Harness> {
  const config = loadConfig({ OPENAI_API_KEY: "test-key", ...opts.env });
  const invoker = new ScriptedInvoker(opts.script ?? [MODEL_REPLY]);
  const extracted: string[] = [];
  const extractor: TextExtractor = {
    async extract(_buffer, filename) {
      extracted.push(filename);
      return opts.extract ? opts.extract() : RESUME;
    },
  };

  const app = createApp({
    config,
    analyzer: new AnalysisPipeline(invoker, { maxAttempts: 3, maxPromptChars: config.maxPromptChars }, { sleep: noSleep }),
    extractor,
  });

  const listening = app.listen(0);
  server = listening;
  await new Promise<void>((resolve) => listening.once("listening", () => resolve()));
  const address = listening.address();
  if (!address || typeof address === "string") throw new Error("test server has no TCP address");
  const { port } = address;

  return {
    http: axios.create({ baseURL: `http://127.0.0.1:${port}`, validateStatus: () => true }),
    invoker,
    extracted,
  };
}

function form(fields: { jd?: string; file?: { name: string; type: string; bytes?: number } }): FormData {
  const fd = new FormData();
  if (fields.jd !== undefined) fd.append("job_description", fields.jd);
  if (fields.file) {
    const body = new Uint8Array(fields.file.bytes ?? 64).fill(37);
    fd.append("resume", new Blob([body], { type: fields.file.type }), fields.file.name);
  }
  return fd;
}

const PDF = { name: "resume.pdf", type: "application/pdf" };

describe("HTTP API", () => {
  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(async () => {
    const s = server;
    server = null;
    if (s) await new Promise<void>((resolve, reject) => s.close((err) => (err ? reject(err) : resolve())));
  });

  it("answers the health check", async () => {
    const { http } = await start();
    const res = await http.get("/", { headers: { Origin: "http://frontend.test" } });

    expect(res.status).toBe(200);
    expect(res.data).toEqual({ status: "healthy", message: "ATS Match API is running", version: "1.0.0" });
    expect(res.headers["access-control-allow-origin"]).toBe("*");
  });

  it("analyzes an uploaded resume", async () => {
    const { http, invoker, extracted } = await start();
    const res = await http.post("/analyze", form({ jd: JD, file: PDF }));

    expect(res.status).toBe(200);
    expect(res.data).toEqual({
      jd_match: "70%",
      missing_keywords: ["kubernetes"],
      profile_summary: "Solid backend skills.",
    });
    expect(extracted).toEqual(["resume.pdf"]);
    expect(invoker.prompts[0]).toContain(RESUME);
  });

  it("returns the fallback body with 200 when the model keeps failing", async () => {
    const { http, invoker } = await start({ script: [new TransientModelError("down", "openai_error", 503)] });
    const res = await http.post("/analyze", form({ jd: JD, file: PDF }));

    expect(res.status).toBe(200);
    expect(invoker.calls).toBe(3);
    expect(res.data.jd_match).toBe("50%");
    expect(res.data.missing_keywords).toEqual([FALLBACK_KEYWORD]);
    expect(res.data.profile_summary).toContain("unavailable");
  });

  it("requires a job description", async () => {
    const { http } = await start();
    const res = await http.post("/analyze", form({ file: PDF }));

    expect(res.status).toBe(400);
    expect(res.data).toEqual({ ok: false, error: "missing_job_description", message: "Job description is required" });
  });

  it("requires a resume file", async () => {
    const { http } = await start();
    const res = await http.post("/analyze", form({ jd: JD }));

    expect(res.status).toBe(400);
    expect(res.data.error).toBe("missing_resume");
  });

  it("rejects a blank job description", async () => {
    const { http, invoker } = await start();
    const res = await http.post("/analyze", form({ jd: "   ", file: PDF }));

    expect(res.status).toBe(400);
    expect(res.data.error).toBe("empty_job_description");
    expect(invoker.calls).toBe(0);
  });

  it("rejects files that are not PDFs", async () => {
    const { http, extracted } = await start();
    const res = await http.post(
      "/analyze",
      form({ jd: JD, file: { name: "resume.docx", type: "application/vnd.openxmlformats-officedocument.wordprocessingml.document" } })
    );

    expect(res.status).toBe(415);
    expect(res.data).toEqual({
      ok: false,
      error: "unsupported_file_type",
      message: "Only PDF files are supported",
      filename: "resume.docx",
      ext: "docx",
      allowed: ["pdf"],
    });
    expect(extracted).toEqual([]);
  });

  it("reports unreadable PDFs", async () => {
    const { http } = await start({
      extract: async () => {
        throw new ExtractionError("PDF processing error: Invalid PDF structure");
      },
    });
    const res = await http.post("/analyze", form({ jd: JD, file: PDF }));

    expect(res.status).toBe(422);
    expect(res.data.error).toBe("pdf_extraction_failed");
  });

  it("reports PDFs without text", async () => {
    const { http, invoker } = await start({ extract: async () => "" });
    const res = await http.post("/analyze", form({ jd: JD, file: PDF }));

    expect(res.status).toBe(400);
    expect(res.data.error).toBe("empty_resume_text");
    expect(invoker.calls).toBe(0);
  });

  it("enforces the upload size ceiling", async () => {
    const { http } = await start({ env: { MAX_UPLOAD_BYTES: "1024" } });
    const res = await http.post("/analyze", form({ jd: JD, file: { ...PDF, bytes: 4096 } }));

    expect(res.status).toBe(413);
    expect(res.data).toEqual({ ok: false, error: "payload_too_large", message: "File too large", maxBytes: 1024 });
  });

  it("returns JSON for unknown routes", async () => {
    const { http } = await start();
    const res = await http.get("/nope");

    expect(res.status).toBe(404);
    expect(res.data).toEqual({ ok: false, error: "not_found", message: "Route not found" });
  });
});
