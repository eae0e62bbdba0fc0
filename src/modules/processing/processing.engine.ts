import fs from "fs";
import { getOmrEngineTimeoutMs } from "../../config";
import { recognitionResultSchema } from "../jobs/jobs.codec";
import { type RecognitionResult, type ScanConfig } from "../jobs/jobs.types";
import { defaultFetch, readErrorBody, type FetchLike } from "../../utils/http";
import { TimeoutError, withAbortTimeout } from "../../utils/withTimeout";
import { type LocalImage } from "./processing.images";

/** Recognizes the marks on one scanned sheet. Any rejection is treated as that sheet's failure reason. */
export type OmrEngine = {
  recognize: (image: LocalImage, scanConfig: ScanConfig) => Promise<RecognitionResult>;
};

export class EngineError extends Error {
  readonly status: number | null;

  constructor(message: string, status: number | null = null) {
    super(message);
    this.name = "EngineError";
    this.status = status;
    Object.setPrototypeOf(this, EngineError.prototype);
  }
}

export type HttpOmrEngineOptions = {
  url: string;
  timeoutMs?: number;
  fetch?: FetchLike;
};

/** Checks an engine reply before it is persisted. */
export function parseRecognitionResult(payload: unknown): RecognitionResult {
  const parsed = recognitionResultSchema.safeParse(payload);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? issue.path.join(".") : "body";
    throw new EngineError(`omr_engine_invalid_response:${where}`);
  }
  return parsed.data;
}

export function createHttpOmrEngine(options: HttpOmrEngineOptions): OmrEngine {
  const fetchImpl = options.fetch ?? defaultFetch;

  return {
    async recognize(image, scanConfig) {
      const timeoutMs = options.timeoutMs ?? getOmrEngineTimeoutMs();
      const buffer = await fs.promises.readFile(image.path);
      const body = JSON.stringify({
        image: buffer.toString("base64"),
        mimeType: image.mimeType,
        scanConfig,
      });

      let payload: unknown;
      try {
        payload = await withAbortTimeout(
          async (signal) => {
            const response = await fetchImpl(options.url, {
              method: "POST",
              headers: { "Content-Type": "application/json" },
              body,
              signal,
            });
            if (!response.ok) {
              const message = await readErrorBody(response);
              throw new EngineError(`omr_engine_failed:${response.status}:${message}`, response.status);
            }
            return response.json();
          },
          timeoutMs,
          "omr engine"
        );
      } catch (error) {
        if (error instanceof EngineError || error instanceof TimeoutError) {
          throw error;
        }
        if (error instanceof SyntaxError) {
          throw new EngineError("omr_engine_invalid_response:malformed_json");
        }
        throw new EngineError(`omr_engine_unreachable:${error instanceof Error ? error.message : String(error)}`);
      }

      return parseRecognitionResult(payload);
    },
  };
}
