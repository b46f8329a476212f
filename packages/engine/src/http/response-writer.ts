import type { ITcpSocket } from "../interfaces/socket.js";
import { concat, fromString } from "../utils/buffer.js";
import { HeaderMap } from "./headers.js";
import { type HttpResponse, statusText } from "./types.js";

const HEADER_NAME_PATTERN = /^[!#$%&'*+\-.^_`|~0-9A-Za-z]+$/;
const DEFAULT_CONTENT_TYPE = "text/plain";

export class HttpResponseSerializeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "HttpResponseSerializeError";
  }
}

/**
 * Encode a response as HTTP/1.1 wire bytes.
 *
 * `Content-Length` is always computed from the body actually written; a
 * caller-supplied value is overwritten in place. Non-empty bodies without a
 * `Content-Type` get `text/plain`, and a missing `Connection` header
 * defaults to `close`.
 */
export function serializeResponse(response: HttpResponse): Uint8Array {
  const headers = new HeaderMap(response.headers);
  const body = response.body ?? new Uint8Array(0);

  if (body.length > 0 && !headers.has("content-type")) {
    headers.set("Content-Type", DEFAULT_CONTENT_TYPE);
  }
  setPreservingName(headers, "Content-Length", String(body.length));
  if (!headers.has("connection")) {
    headers.set("Connection", "close");
  }

  const headerBytes = buildHeaderBytes(response.status, headers);
  return body.length > 0 ? concat([headerBytes, body]) : headerBytes;
}

/**
 * Send a complete HTTP response (headers + body) over a socket.
 */
export function sendResponse(socket: ITcpSocket, response: HttpResponse): void {
  socket.send(serializeResponse(response));
}

/**
 * Like {@link sendResponse}, but waits for the socket to accept the bytes
 * when it supports drain-aware writes.
 */
export async function sendResponseAndWait(
  socket: ITcpSocket,
  response: HttpResponse,
): Promise<void> {
  const bytes = serializeResponse(response);
  if (socket.sendAndWait) {
    await socket.sendAndWait(bytes);
    return;
  }
  socket.send(bytes);
}

function buildHeaderBytes(status: number, headers: HeaderMap): Uint8Array {
  if (!Number.isInteger(status) || status < 100 || status > 999) {
    throw new HttpResponseSerializeError(`Invalid status code: ${status}`);
  }

  const lines: string[] = [`HTTP/1.1 ${status} ${statusText(status)}`];
  for (const [name, value] of headers) {
    assertValidHeader(name, value);
    lines.push(`${name}: ${value}`);
  }
  lines.push("", ""); // \r\n\r\n
  return fromString(lines.join("\r\n"));
}

function assertValidHeader(name: string, value: string): void {
  if (!HEADER_NAME_PATTERN.test(name)) {
    throw new HttpResponseSerializeError(
      `Invalid header name: ${JSON.stringify(name)}`,
    );
  }
  if (value.includes("\r") || value.includes("\n")) {
    throw new HttpResponseSerializeError(
      `Header ${name} contains a line break`,
    );
  }
}

// Keep a caller's spelling of the name but never their value.
function setPreservingName(
  headers: HeaderMap,
  canonicalName: string,
  value: string,
): void {
  for (const [name] of headers) {
    if (name.toLowerCase() === canonicalName.toLowerCase()) {
      headers.set(name, value);
      return;
    }
  }
  headers.set(canonicalName, value);
}
