import fs from "fs";
import os from "os";
import path from "path";
import { fileURLToPath } from "url";
import { getImageDownloadTimeoutMs, getImageMaxBytes } from "../../config";
import { describeError, logWarn } from "../../observability/logger";
import { defaultFetch, type FetchLike } from "../../utils/http";
import { TimeoutError, withAbortTimeout } from "../../utils/withTimeout";

export type LocalImage = {
  path: string;
  mimeType: string;
  sizeBytes: number;
  /** Removes whatever the source created for this image. Safe to call more than once. */
  release: () => Promise<void>;
};

export type ImageSource = {
  fetch: (locator: string) => Promise<LocalImage>;
};

export type ImageSourceOptions = {
  timeoutMs?: number;
  maxBytes?: number;
  fetch?: FetchLike;
  tempDir?: string;
};

export class ImageAcquisitionError extends Error {
  readonly locator: string;

  constructor(locator: string, reason: string) {
    super(reason);
    this.name = "ImageAcquisitionError";
    this.locator = locator;
    Object.setPrototypeOf(this, ImageAcquisitionError.prototype);
  }
}

const EXTENSION_MIME_TYPES: Record<string, string> = {
  ".jpg": "image/jpeg",
  ".jpeg": "image/jpeg",
  ".png": "image/png",
  ".tif": "image/tiff",
  ".tiff": "image/tiff",
  ".bmp": "image/bmp",
  ".webp": "image/webp",
};

function extensionForMimeType(mimeType: string): string {
  const normalized = mimeType.toLowerCase();
  if (normalized.includes("png")) return ".png";
  if (normalized.includes("tiff")) return ".tiff";
  if (normalized.includes("bmp")) return ".bmp";
  if (normalized.includes("webp")) return ".webp";
  return ".jpg";
}

function mimeTypeForPath(filePath: string): string {
  return EXTENSION_MIME_TYPES[path.extname(filePath).toLowerCase()] ?? "image/jpeg";
}

function parseDataUrl(locator: string): { mimeType: string; buffer: Buffer } | null {
  const match = /^data:([^;,]*)(;base64)?,(.*)$/s.exec(locator);
  if (!match) {
    return null;
  }
  const mimeType = match[1] || "image/jpeg";
  const payload = match[3];
  const buffer = match[2]
    ? Buffer.from(payload, "base64")
    : Buffer.from(decodeURIComponent(payload), "utf8");
  return { mimeType, buffer };
}

async function writeTempImage(tempRoot: string, buffer: Buffer, mimeType: string): Promise<LocalImage> {
  const dir = await fs.promises.mkdtemp(path.join(tempRoot, "omr-sheet-"));
  const filePath = path.join(dir, `image${extensionForMimeType(mimeType)}`);
  await fs.promises.writeFile(filePath, buffer);
  let released = false;
  return {
    path: filePath,
    mimeType,
    sizeBytes: buffer.length,
    release: async () => {
      if (released) {
        return;
      }
      released = true;
      await fs.promises.rm(dir, { recursive: true, force: true });
    },
  };
}

export function createImageSource(options: ImageSourceOptions = {}): ImageSource {
  const fetchImpl = options.fetch ?? defaultFetch;
  const tempRoot = options.tempDir ?? os.tmpdir();

  async function download(locator: string): Promise<LocalImage> {
    const timeoutMs = options.timeoutMs ?? getImageDownloadTimeoutMs();
    const maxBytes = options.maxBytes ?? getImageMaxBytes();
    let response: Response;
    let body: ArrayBuffer;
    try {
      ({ response, body } = await withAbortTimeout(
        async (signal) => {
          const res = await fetchImpl(locator, { method: "GET", signal });
          if (!res.ok) {
            return { response: res, body: new ArrayBuffer(0) };
          }
          const declared = Number(res.headers.get("content-length") ?? "0");
          if (declared > maxBytes) {
            throw new ImageAcquisitionError(locator, `image_too_large:${declared}`);
          }
          return { response: res, body: await res.arrayBuffer() };
        },
        timeoutMs,
        "image download"
      ));
    } catch (error) {
      if (error instanceof ImageAcquisitionError) {
        throw error;
      }
      if (error instanceof TimeoutError) {
        throw new ImageAcquisitionError(locator, error.message);
      }
      throw new ImageAcquisitionError(locator, `download_failed:${describeError(error)}`);
    }
    if (!response.ok) {
      throw new ImageAcquisitionError(locator, `download_failed:${response.status}`);
    }
    if (body.byteLength === 0) {
      throw new ImageAcquisitionError(locator, "image_empty");
    }
    if (body.byteLength > maxBytes) {
      throw new ImageAcquisitionError(locator, `image_too_large:${body.byteLength}`);
    }
    const mimeType = response.headers.get("content-type")?.split(";")[0]?.trim() || "image/jpeg";
    return writeTempImage(tempRoot, Buffer.from(body), mimeType);
  }

  async function openLocalFile(locator: string, filePath: string): Promise<LocalImage> {
    let stat: fs.Stats;
    try {
      stat = await fs.promises.stat(filePath);
    } catch (error) {
      throw new ImageAcquisitionError(locator, `file_unreadable:${describeError(error)}`);
    }
    if (!stat.isFile()) {
      throw new ImageAcquisitionError(locator, "not_a_file");
    }
    // The caller owns local files; releasing them is a no-op.
    return {
      path: filePath,
      mimeType: mimeTypeForPath(filePath),
      sizeBytes: stat.size,
      release: async () => undefined,
    };
  }

  return {
    async fetch(locator) {
      const trimmed = locator.trim();
      if (trimmed.length === 0) {
        throw new ImageAcquisitionError(locator, "empty_locator");
      }

      const dataUrl = parseDataUrl(trimmed);
      if (dataUrl) {
        if (dataUrl.buffer.length === 0) {
          throw new ImageAcquisitionError(locator, "image_empty");
        }
        return writeTempImage(tempRoot, dataUrl.buffer, dataUrl.mimeType);
      }

      if (/^https?:\/\//i.test(trimmed)) {
        return download(trimmed);
      }

      if (/^file:\/\//i.test(trimmed)) {
        return openLocalFile(locator, fileURLToPath(trimmed));
      }

      if (/^[a-z][a-z0-9+.-]*:\/\//i.test(trimmed)) {
        throw new ImageAcquisitionError(locator, "unsupported_scheme");
      }

      return openLocalFile(locator, path.resolve(trimmed));
    },
  };
}

/** Releases an image. A failed release is logged, never thrown. */
export async function releaseQuietly(image: LocalImage): Promise<void> {
  try {
    await image.release();
  } catch (error) {
    logWarn("omr_image_release_failed", { path: image.path, error: describeError(error) });
  }
}
