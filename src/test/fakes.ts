import { type RecognitionResult } from "../modules/jobs/jobs.types";
import { EngineError, type OmrEngine } from "../modules/processing/processing.engine";
import {
  ImageAcquisitionError,
  type ImageSource,
  type LocalImage,
} from "../modules/processing/processing.images";
import { type FetchLike } from "../utils/http";

export type FakeImageSource = ImageSource & {
  fetched: string[];
  released: string[];
};

/**
 * Locators starting with `missing:` fail acquisition and `hang:` never settle;
 * everything else resolves to a fake local path.
 */
export function createFakeImageSource(): FakeImageSource {
  const fetched: string[] = [];
  const released: string[] = [];
  return {
    fetched,
    released,
    async fetch(locator) {
      fetched.push(locator);
      if (locator.startsWith("missing:")) {
        throw new ImageAcquisitionError(locator, "file_unreadable:ENOENT");
      }
      if (locator.startsWith("hang:")) {
        return new Promise<LocalImage>(() => undefined);
      }
      const image: LocalImage = {
        path: locator,
        mimeType: "image/png",
        sizeBytes: 4,
        release: async () => {
          released.push(locator);
        },
      };
      return image;
    },
  };
}

export type EngineScript = RecognitionResult | { fail: string } | "hang";

export type FakeEngine = OmrEngine & {
  calls: string[];
};

/** Answers by image path. Paths without a script entry fail with `no_marks_detected`. */
export function createScriptedEngine(script: Record<string, EngineScript>): FakeEngine {
  const calls: string[] = [];
  return {
    calls,
    async recognize(image) {
      calls.push(image.path);
      const entry = script[image.path];
      if (entry === undefined) {
        throw new EngineError("no_marks_detected");
      }
      if (entry === "hang") {
        return new Promise<RecognitionResult>(() => undefined);
      }
      if ("fail" in entry) {
        throw new EngineError(entry.fail);
      }
      return entry;
    },
  };
}

export type RecordedRequest = {
  url: string;
  method: string;
  body: string;
};

export type FakeFetch = {
  fetch: FetchLike;
  requests: RecordedRequest[];
};

/**
 * Replies with the queued statuses in order, repeating the last one. `"network"`
 * rejects as an unreachable host would. `delayMs` holds every reply back after the
 * request is recorded.
 */
export function createFakeFetch(
  statuses: Array<number | "network">,
  options: { delayMs?: number } = {}
): FakeFetch {
  const requests: RecordedRequest[] = [];
  const fetch: FetchLike = async (input, init) => {
    requests.push({
      url: input,
      method: init?.method ?? "GET",
      body: typeof init?.body === "string" ? init.body : "",
    });
    const next = statuses[Math.min(requests.length - 1, statuses.length - 1)];
    if (options.delayMs) {
      await new Promise((resolve) => setTimeout(resolve, options.delayMs));
    }
    if (next === "network") {
      throw new TypeError("fetch failed");
    }
    return new Response(next >= 200 && next < 300 ? "ok" : "receiver unavailable", { status: next });
  };
  return { fetch, requests };
}
