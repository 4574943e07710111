import fs from "node:fs/promises";
import { setTimeout as sleep } from "node:timers/promises";
import { z } from "zod";
import type { RawExtractionResult } from "../types/invoice.js";
import { InvoiceQaError, errorMessage } from "../utils/errors.js";
import type { SourceDocument } from "./loadDocuments.js";
import { formatZodError, parseRawExtraction } from "./schemas.js";

/** Field extraction collaborator. One result per invoice found in the document. */
export interface ExtractionService {
  readonly name: string;
  analyze(document: SourceDocument, signal?: AbortSignal): Promise<RawExtractionResult[]>;
}

const documentsSchema = z.array(z.object({ fields: z.record(z.unknown()).nullish() }));

const analyzeResultSchema = z.object({
  documents: documentsSchema.default([]),
});

const operationSchema = z.object({
  status: z.enum(["notStarted", "running", "succeeded", "failed", "canceled"]),
  analyzeResult: analyzeResultSchema.nullish(),
  error: z.object({ message: z.string().optional() }).passthrough().nullish(),
});

function toResults(documents: z.infer<typeof documentsSchema>): RawExtractionResult[] {
  return documents.map((d) => parseRawExtraction({ fields: d.fields ?? {} }));
}

export type DocumentIntelligenceConfig = {
  endpoint: string;
  apiKey: string;
  modelId?: string;
  apiVersion?: string;
  pollMs?: number;
  maxPolls?: number;
};

/** Azure AI Document Intelligence prebuilt-invoice model over REST. */
export class DocumentIntelligenceExtractor implements ExtractionService {
  readonly name = "document-intelligence";
  private readonly config: Required<DocumentIntelligenceConfig>;

  constructor(config: DocumentIntelligenceConfig) {
    this.config = {
      endpoint: config.endpoint.replace(/\/+$/, ""),
      apiKey: config.apiKey,
      modelId: config.modelId ?? "prebuilt-invoice",
      apiVersion: config.apiVersion ?? "2024-11-30",
      pollMs: config.pollMs ?? 1000,
      maxPolls: config.maxPolls ?? 120,
    };
  }

  async analyze(document: SourceDocument, signal?: AbortSignal): Promise<RawExtractionResult[]> {
    const bytes = await fs.readFile(document.path);
    const { endpoint, modelId, apiVersion } = this.config;
    const url = `${endpoint}/documentintelligence/documentModels/${modelId}:analyze?api-version=${apiVersion}`;

    const started = await this.request(url, "POST", signal, JSON.stringify({ base64Source: bytes.toString("base64") }));
    const operationUrl = started.headers.get("operation-location");
    if (!operationUrl) {
      throw new InvoiceQaError(`${document.fileName}: analyze response had no Operation-Location`, "EXTRACTION_FAILED");
    }

    for (let poll = 0; poll < this.config.maxPolls; poll++) {
      const res = await this.request(operationUrl, "GET", signal);
      const text = await res.text();
      let json: unknown;
      try {
        json = JSON.parse(text);
      } catch (err) {
        throw new InvoiceQaError(
          `${document.fileName}: analysis status was not JSON: ${text.slice(0, 120)}`,
          "EXTRACTION_UNAVAILABLE",
          { retryable: true, cause: err }
        );
      }
      const parsed = operationSchema.safeParse(json);
      if (!parsed.success) {
        throw new InvoiceQaError(`${document.fileName}: ${formatZodError(parsed.error)}`, "EXTRACTION_FAILED");
      }

      const op = parsed.data;
      if (op.status === "succeeded") return toResults(op.analyzeResult?.documents ?? []);
      if (op.status === "failed" || op.status === "canceled") {
        throw new InvoiceQaError(
          `${document.fileName}: analysis ${op.status}: ${op.error?.message ?? "no details"}`,
          "EXTRACTION_FAILED"
        );
      }
      await sleep(this.config.pollMs, undefined, { signal });
    }

    throw new InvoiceQaError(`${document.fileName}: analysis did not finish in time`, "EXTRACTION_UNAVAILABLE", {
      retryable: true,
    });
  }

  private async request(url: string, method: "GET" | "POST", signal?: AbortSignal, body?: string): Promise<Response> {
    const headers: Record<string, string> = { "Ocp-Apim-Subscription-Key": this.config.apiKey };
    if (body !== undefined) headers["Content-Type"] = "application/json";

    let res: Response;
    try {
      res = await fetch(url, { method, headers, body, signal });
    } catch (err) {
      if (signal?.aborted) throw err;
      throw new InvoiceQaError(`extraction request failed: ${errorMessage(err)}`, "EXTRACTION_UNAVAILABLE", {
        retryable: true,
        cause: err,
      });
    }

    if (res.ok) return res;
    const text = await res.text().catch(() => "");
    const retryable = res.status === 429 || res.status >= 500;
    throw new InvoiceQaError(
      `extraction HTTP ${res.status}: ${text.slice(0, 300)}`,
      retryable ? "EXTRACTION_UNAVAILABLE" : "EXTRACTION_FAILED",
      { retryable }
    );
  }
}

/**
 * Reads results saved next to each PDF as `<file>.fields.json`. Accepts a
 * single `{ fields }` object, `{ documents: [...] }`, or a full analyze
 * operation payload.
 */
export class JsonSidecarExtractor implements ExtractionService {
  readonly name = "json-sidecar";

  async analyze(document: SourceDocument): Promise<RawExtractionResult[]> {
    const sidecar = `${document.path}.fields.json`;
    let json: unknown;
    try {
      json = JSON.parse(await fs.readFile(sidecar, "utf-8"));
    } catch (err) {
      throw new InvoiceQaError(`${document.fileName}: cannot read ${sidecar}: ${errorMessage(err)}`, "EXTRACTION_FAILED");
    }

    const single = z.object({ fields: z.record(z.unknown()) }).safeParse(json);
    if (single.success) return [parseRawExtraction(single.data)];

    const operation = operationSchema.safeParse(json);
    if (operation.success && operation.data.analyzeResult) return toResults(operation.data.analyzeResult.documents);

    const result = z.object({ documents: documentsSchema }).safeParse(json);
    if (result.success) return toResults(result.data.documents);

    throw new InvoiceQaError(`${document.fileName}: ${sidecar} is not an extraction result`, "EXTRACTION_FAILED");
  }
}
