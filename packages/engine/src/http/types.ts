import type { HeaderInit, HeaderMap } from "./headers.js";

export const HTTP_METHODS = ["GET", "POST"] as const;

export type HttpMethod = (typeof HTTP_METHODS)[number];

export function isHttpMethod(value: string): value is HttpMethod {
  return (HTTP_METHODS as readonly string[]).includes(value);
}

export interface HttpRequest {
  method: HttpMethod;
  /** Raw request target as received, query string included. */
  target: string;
  /** Target up to (not including) the first `?`. */
  path: string;
  /** Raw text after the first `?`, or null when the target has none. */
  query: string | null;
  /** Version number without the `HTTP/` prefix, e.g. `1.1`. */
  httpVersion: string;
  headers: HeaderMap;
  body: Uint8Array;
}

export interface HttpResponse {
  status: number;
  headers?: HeaderInit;
  body?: Uint8Array;
  /** The body may be content-encoded if the client accepts it. */
  compressible?: boolean;
  /** Close the connection once this response is written. */
  close?: boolean;
}

export const STATUS_TEXT: Record<number, string> = {
  200: "OK",
  201: "Created",
  204: "No Content",
  400: "Bad Request",
  403: "Forbidden",
  404: "Not Found",
  405: "Method Not Allowed",
  408: "Request Timeout",
  413: "Content Too Large",
  431: "Request Header Fields Too Large",
  500: "Internal Server Error",
  501: "Not Implemented",
  503: "Service Unavailable",
};

export function statusText(status: number): string {
  return STATUS_TEXT[status] ?? "Unknown";
}
