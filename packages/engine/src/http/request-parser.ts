import type { ITcpSocket } from "../interfaces/socket.js";
import { concat, decodeToString, indexOfSequence } from "../utils/buffer.js";
import { HeaderMap } from "./headers.js";
import { type HttpMethod, type HttpRequest, isHttpMethod } from "./types.js";

const CRLF = new Uint8Array([13, 10]); // \r\n
const CRLF_CRLF = new Uint8Array([13, 10, 13, 10]); // \r\n\r\n
const DEFAULT_MAX_HEADER_SIZE = 8 * 1024; // 8KB
const DEFAULT_MAX_BODY_SIZE = 10 * 1024 * 1024; // 10MB
const DEFAULT_IDLE_TIMEOUT_MS = 15_000;
const DEFAULT_REQUEST_TIMEOUT_MS = 5000;

const HTTP_VERSION_PATTERN = /^HTTP\/(\d)\.(\d)$/;
const HEADER_NAME_PATTERN = /^[!#$%&'*+\-.^_`|~0-9A-Za-z]+$/;
const CONTENT_LENGTH_PATTERN = /^\d+$/;

export interface ParseHttpRequestOptions {
  maxHeaderSize?: number;
  maxBodySize?: number;
  /** How long to wait for the first byte of a request. */
  idleTimeoutMs?: number;
  /** How long a request may take once its first byte has arrived. */
  requestTimeoutMs?: number;
}

export interface HttpRequestHead {
  method: HttpMethod;
  target: string;
  path: string;
  query: string | null;
  httpVersion: string;
  headers: HeaderMap;
  contentLength: number;
}

export type HttpRequestParseErrorCode =
  | "IDLE_TIMEOUT"
  | "REQUEST_TIMEOUT"
  | "CONNECTION_CLOSED"
  | "CONNECTION_CLOSED_INCOMPLETE"
  | "HEADERS_TOO_LARGE"
  | "MALFORMED_REQUEST_LINE"
  | "MALFORMED_HEADER"
  | "INVALID_CONTENT_LENGTH"
  | "BODY_TOO_LARGE";

export type HttpRequestParseErrorKind =
  | "MalformedRequestLine"
  | "ConnectionClosed"
  | "Timeout"
  | "PayloadTooLarge";

const ERROR_KINDS: Record<HttpRequestParseErrorCode, HttpRequestParseErrorKind> = {
  IDLE_TIMEOUT: "Timeout",
  REQUEST_TIMEOUT: "Timeout",
  CONNECTION_CLOSED: "ConnectionClosed",
  CONNECTION_CLOSED_INCOMPLETE: "ConnectionClosed",
  HEADERS_TOO_LARGE: "PayloadTooLarge",
  MALFORMED_REQUEST_LINE: "MalformedRequestLine",
  MALFORMED_HEADER: "MalformedRequestLine",
  INVALID_CONTENT_LENGTH: "MalformedRequestLine",
  BODY_TOO_LARGE: "PayloadTooLarge",
};

export class HttpRequestParseError extends Error {
  constructor(
    readonly code: HttpRequestParseErrorCode,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "HttpRequestParseError";
  }

  get kind(): HttpRequestParseErrorKind {
    return ERROR_KINDS[this.code];
  }
}

interface ParsedRequestHeadResult {
  head: HttpRequestHead;
  bytesConsumed: number;
}

interface RequestLine {
  method: HttpMethod;
  target: string;
  httpVersion: string;
}

function parseRequestLine(line: string): RequestLine {
  const parts = line.split(" ");
  if (parts.length !== 3) {
    throw new HttpRequestParseError(
      "MALFORMED_REQUEST_LINE",
      `Malformed request line: expected 3 tokens, got ${parts.length}`,
    );
  }

  const [method, target, rawVersion] = parts;
  if (!isHttpMethod(method)) {
    throw new HttpRequestParseError(
      "MALFORMED_REQUEST_LINE",
      `Unsupported method: ${JSON.stringify(method)}`,
    );
  }
  if (!target.startsWith("/")) {
    throw new HttpRequestParseError(
      "MALFORMED_REQUEST_LINE",
      `Request target must start with "/": ${JSON.stringify(target)}`,
    );
  }
  const version = HTTP_VERSION_PATTERN.exec(rawVersion);
  if (!version) {
    throw new HttpRequestParseError(
      "MALFORMED_REQUEST_LINE",
      `Invalid HTTP version: ${JSON.stringify(rawVersion)}`,
    );
  }

  return { method, target, httpVersion: `${version[1]}.${version[2]}` };
}

function parseHeaderLines(lines: string[]): HeaderMap {
  const headers = new HeaderMap();
  for (const line of lines) {
    const colonIdx = line.indexOf(":");
    const name = colonIdx === -1 ? "" : line.substring(0, colonIdx);
    if (!HEADER_NAME_PATTERN.test(name)) {
      throw new HttpRequestParseError(
        "MALFORMED_HEADER",
        `Malformed header line: ${JSON.stringify(line)}`,
      );
    }
    headers.set(name, line.substring(colonIdx + 1).trim());
  }
  return headers;
}

function parseContentLength(headers: HeaderMap): number {
  const raw = headers.get("content-length");
  if (raw === undefined) return 0;
  if (!CONTENT_LENGTH_PATTERN.test(raw)) {
    throw new HttpRequestParseError(
      "INVALID_CONTENT_LENGTH",
      `Invalid Content-Length: ${JSON.stringify(raw)}`,
    );
  }
  const contentLength = Number.parseInt(raw, 10);
  if (!Number.isSafeInteger(contentLength)) {
    throw new HttpRequestParseError(
      "INVALID_CONTENT_LENGTH",
      `Invalid Content-Length: ${JSON.stringify(raw)}`,
    );
  }
  return contentLength;
}

function splitTarget(target: string): { path: string; query: string | null } {
  const queryIdx = target.indexOf("?");
  if (queryIdx === -1) {
    return { path: target, query: null };
  }
  return {
    path: target.slice(0, queryIdx),
    query: target.slice(queryIdx + 1),
  };
}

/**
 * Try to parse a request head from the start of `buffer`. Returns null when
 * more bytes are needed. The request line is validated as soon as its CRLF
 * arrives, without waiting for the rest of the header block.
 */
export function tryParseRequestHead(
  buffer: Uint8Array,
  maxHeaderSize: number,
): ParsedRequestHeadResult | null {
  const lineEnd = indexOfSequence(buffer, CRLF);
  if (lineEnd === -1) {
    if (buffer.length > maxHeaderSize) {
      throw new HttpRequestParseError(
        "HEADERS_TOO_LARGE",
        "Request headers too large",
      );
    }
    return null;
  }

  const requestLine = parseRequestLine(
    decodeToString(buffer.subarray(0, lineEnd)),
  );

  // The blank line may directly follow the request line.
  const separatorIndex = indexOfSequence(buffer, CRLF_CRLF, lineEnd);
  if (separatorIndex === -1) {
    if (buffer.length > maxHeaderSize) {
      throw new HttpRequestParseError(
        "HEADERS_TOO_LARGE",
        "Request headers too large",
      );
    }
    return null;
  }

  if (separatorIndex > maxHeaderSize) {
    throw new HttpRequestParseError(
      "HEADERS_TOO_LARGE",
      "Request headers too large",
    );
  }

  const headerBlock = decodeToString(
    buffer.subarray(lineEnd + CRLF.length, separatorIndex),
  );
  const headers = parseHeaderLines(
    headerBlock.length === 0 ? [] : headerBlock.split("\r\n"),
  );
  const contentLength = parseContentLength(headers);

  return {
    head: {
      ...requestLine,
      ...splitTarget(requestLine.target),
      headers,
      contentLength,
    },
    bytesConsumed: separatorIndex + CRLF_CRLF.length,
  };
}

/**
 * Reads requests one at a time from a single socket. Bytes left over after
 * one request stay buffered for the next call.
 */
export class HttpRequestStreamParser {
  private buffer: Uint8Array = new Uint8Array(0);
  private closed = false;
  private socketError: Error | null = null;
  private waiters: Array<() => void> = [];

  constructor(socket: ITcpSocket) {
    socket.onData((data) => {
      this.buffer = concat([this.buffer, data]);
      this.notifyWaiters();
    });

    socket.onClose(() => {
      this.closed = true;
      this.notifyWaiters();
    });

    socket.onError((err) => {
      this.socketError = err;
      this.closed = true;
      this.notifyWaiters();
    });
  }

  /** Bytes received but not yet consumed by a parsed request. */
  get bufferedBytes(): number {
    return this.buffer.length;
  }

  async readRequest(options?: ParseHttpRequestOptions): Promise<HttpRequest> {
    const head = await this.readRequestHead(options);
    const body = await this.readBody(head.contentLength, options);

    return {
      method: head.method,
      target: head.target,
      path: head.path,
      query: head.query,
      httpVersion: head.httpVersion,
      headers: head.headers,
      body,
    };
  }

  async readRequestHead(
    options?: ParseHttpRequestOptions,
  ): Promise<HttpRequestHead> {
    const maxHeaderSize = options?.maxHeaderSize ?? DEFAULT_MAX_HEADER_SIZE;
    const idleTimeoutMs = options?.idleTimeoutMs ?? DEFAULT_IDLE_TIMEOUT_MS;
    const requestTimeoutMs =
      options?.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;

    let started = this.buffer.length > 0;
    let deadline = Date.now() + (started ? requestTimeoutMs : idleTimeoutMs);

    while (true) {
      const parsed = tryParseRequestHead(this.buffer, maxHeaderSize);
      if (parsed) {
        this.buffer = this.buffer.slice(parsed.bytesConsumed);
        return parsed.head;
      }

      this.throwIfClosed(this.buffer.length === 0);

      const hadActivity = await this.waitForActivity(deadline - Date.now());
      if (!hadActivity) {
        if (!started) {
          throw new HttpRequestParseError(
            "IDLE_TIMEOUT",
            "Connection idle timed out",
          );
        }

        throw new HttpRequestParseError(
          "REQUEST_TIMEOUT",
          "Request timed out before completion",
        );
      }

      if (!started && this.buffer.length > 0) {
        started = true;
        deadline = Date.now() + requestTimeoutMs;
      }
    }
  }

  /**
   * Read exactly `contentLength` body bytes. A zero length resolves to an
   * empty body without touching the socket.
   */
  async readBody(
    contentLength: number,
    options?: ParseHttpRequestOptions,
  ): Promise<Uint8Array> {
    if (contentLength <= 0) {
      return new Uint8Array(0);
    }

    const maxBodySize = options?.maxBodySize ?? DEFAULT_MAX_BODY_SIZE;
    if (contentLength > maxBodySize) {
      throw new HttpRequestParseError(
        "BODY_TOO_LARGE",
        "Request body too large",
      );
    }

    const timeoutMs = options?.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
    const deadline = Date.now() + timeoutMs;

    while (this.buffer.length < contentLength) {
      this.throwIfClosed(false);

      const hadActivity = await this.waitForActivity(deadline - Date.now());
      if (!hadActivity) {
        throw new HttpRequestParseError(
          "REQUEST_TIMEOUT",
          "Request timed out before completion",
        );
      }
    }

    const body = this.buffer.slice(0, contentLength);
    this.buffer = this.buffer.slice(contentLength);
    return body;
  }

  private throwIfClosed(atMessageBoundary: boolean): void {
    if (this.socketError) {
      throw new HttpRequestParseError(
        "CONNECTION_CLOSED",
        `Socket error: ${this.socketError.message}`,
        { cause: this.socketError },
      );
    }

    if (!this.closed) return;

    if (atMessageBoundary) {
      throw new HttpRequestParseError("CONNECTION_CLOSED", "Connection closed");
    }

    throw new HttpRequestParseError(
      "CONNECTION_CLOSED_INCOMPLETE",
      "Connection closed before request was complete",
    );
  }

  private waitForActivity(timeoutMs: number): Promise<boolean> {
    if (timeoutMs <= 0) {
      return Promise.resolve(false);
    }

    return new Promise((resolve) => {
      let settled = false;

      const onActivity = () => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        resolve(true);
      };

      const timer = setTimeout(() => {
        if (settled) return;
        settled = true;
        this.waiters = this.waiters.filter((waiter) => waiter !== onActivity);
        resolve(false);
      }, timeoutMs);

      this.waiters.push(onActivity);
    });
  }

  private notifyWaiters(): void {
    const waiters = this.waiters;
    this.waiters = [];
    for (const waiter of waiters) {
      waiter();
    }
  }
}

export function createHttpRequestParser(
  socket: ITcpSocket,
): HttpRequestStreamParser {
  return new HttpRequestStreamParser(socket);
}

/**
 * Parse a single HTTP/1.1 request from a TCP socket stream.
 * Returns a promise that resolves with the parsed request.
 */
export function parseHttpRequest(
  socket: ITcpSocket,
  options?: ParseHttpRequestOptions,
): Promise<HttpRequest> {
  return createHttpRequestParser(socket).readRequest(options);
}
