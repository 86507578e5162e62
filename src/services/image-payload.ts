import { GenerationError, httpError } from "../errors.js";
import type { FetchFn, ImagePayload } from "../types/index.js";

/**
 * Classifies a raw image string by prefix: `http` is a URL to download,
 * `data:image` is a data URI, anything else is raw base64.
 */
export function parseImagePayload(raw: string): ImagePayload {
  const value = raw.trim();
  if (value.startsWith("http")) {
    return { kind: "url", url: value };
  }
  if (value.startsWith("data:image")) {
    const comma = value.indexOf(",");
    const header = comma === -1 ? value : value.slice(0, comma);
    const mimeType = header.slice("data:".length).split(";")[0] || "image/png";
    return { kind: "dataUri", mimeType, base64: comma === -1 ? "" : value.slice(comma + 1) };
  }
  return { kind: "base64", base64: value };
}

export function describeImagePayload(payload: ImagePayload): string {
  switch (payload.kind) {
    case "url":
      return `image URL ${payload.url}`;
    case "dataUri":
      return `${payload.mimeType} data URI`;
    case "base64":
      return "base64 image";
  }
}

async function download(url: string, fetchFn: FetchFn): Promise<Buffer> {
  const response = await fetchFn(url, { method: "GET" });
  if (!response.ok) {
    throw httpError("Image download", response.status, await response.text().catch(() => ""));
  }
  return Buffer.from(await response.arrayBuffer());
}

/**
 * Produces the bytes to upload, downloading URL payloads first.
 */
export async function materializeImage(payload: ImagePayload, fetchFn: FetchFn): Promise<Buffer> {
  const bytes =
    payload.kind === "url" ? await download(payload.url, fetchFn) : Buffer.from(payload.base64, "base64");

  if (bytes.length === 0) {
    throw new GenerationError(`Image payload is empty (${describeImagePayload(payload)})`);
  }
  return bytes;
}
