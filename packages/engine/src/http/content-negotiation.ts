import { deflateSync, gzipSync } from "node:zlib";
import { HeaderMap } from "./headers.js";
import type { HttpResponse } from "./types.js";

export type ContentEncoding = "gzip" | "deflate";

/** Supported encodings in order of preference. */
export const SUPPORTED_ENCODINGS: readonly ContentEncoding[] = [
  "gzip",
  "deflate",
];

const ENCODERS: Record<ContentEncoding, (body: Uint8Array) => Uint8Array> = {
  gzip: (body) => new Uint8Array(gzipSync(body)),
  deflate: (body) => new Uint8Array(deflateSync(body)),
};

/**
 * Parse an `Accept-Encoding` value into coding → quality. Codings are
 * lowercased; a missing or unparsable `q` counts as 1.
 */
export function parseAcceptEncoding(
  header: string | undefined,
): Map<string, number> {
  const accepted = new Map<string, number>();
  if (!header) return accepted;

  for (const item of header.split(",")) {
    const [rawCoding, ...params] = item.split(";");
    const coding = rawCoding.trim().toLowerCase();
    if (!coding) continue;

    let quality = 1;
    for (const param of params) {
      const [key, value] = param.split("=").map((part) => part.trim());
      if (key.toLowerCase() !== "q" || value === undefined) continue;
      const parsed = Number.parseFloat(value);
      if (!Number.isNaN(parsed)) quality = parsed;
    }
    accepted.set(coding, quality);
  }
  return accepted;
}

/**
 * First supported encoding the client accepts, or null for identity.
 * An explicit `q=0` refuses a coding even when `*` would allow it.
 */
export function selectEncoding(
  acceptEncoding: string | undefined,
): ContentEncoding | null {
  const accepted = parseAcceptEncoding(acceptEncoding);
  const wildcard = accepted.get("*");

  for (const encoding of SUPPORTED_ENCODINGS) {
    const quality = accepted.get(encoding) ?? wildcard;
    if (quality !== undefined && quality > 0) {
      return encoding;
    }
  }
  return null;
}

export function encodeBody(
  body: Uint8Array,
  encoding: ContentEncoding,
): Uint8Array {
  return ENCODERS[encoding](body);
}

/**
 * Apply the negotiated content encoding to a compressible response. The
 * input response is never mutated; a response that is not eligible comes
 * back as the same object.
 */
export function negotiateContentEncoding(
  response: HttpResponse,
  acceptEncoding: string | undefined,
): HttpResponse {
  const body = response.body;
  if (!response.compressible || !body || body.length === 0) {
    return response;
  }

  const headers = new HeaderMap(response.headers);
  if (headers.has("content-encoding")) {
    return response;
  }

  const encoding = selectEncoding(acceptEncoding);
  if (!encoding) {
    return response;
  }

  headers.set("Content-Encoding", encoding);
  return {
    ...response,
    headers,
    body: encodeBody(body, encoding),
  };
}
