import type { ServerConfig } from "../config/server-config.js";
import { negotiateContentEncoding } from "../http/content-negotiation.js";
import { HeaderMap } from "../http/headers.js";
import {
  createHttpRequestParser,
  HttpRequestParseError,
  type HttpRequestStreamParser,
} from "../http/request-parser.js";
import {
  HttpResponseSerializeError,
  sendResponse,
  sendResponseAndWait,
} from "../http/response-writer.js";
import { HandlerError, type Router } from "../http/router.js";
import type { HttpRequest, HttpResponse } from "../http/types.js";
import { STATUS_TEXT } from "../http/types.js";
import { fileErrorCode } from "../interfaces/filesystem.js";
import type { ITcpSocket } from "../interfaces/socket.js";
import type { Logger } from "../logging/logger.js";
import { fromString } from "../utils/buffer.js";

export type ConnectionState =
  | "awaiting-request"
  | "dispatching"
  | "responded"
  | "closed";

export interface HttpConnectionOptions {
  socket: ITcpSocket;
  router: Router;
  config: ServerConfig;
  logger: Logger;
  onStateChange?: (state: ConnectionState) => void;
}

/**
 * One client connection. Reads a request, dispatches it, writes the
 * response, and loops while the exchange allows the connection to persist.
 *
 * awaiting-request → dispatching → responded → awaiting-request | closed
 *
 * Parse failures go straight to closed, with a best-effort 4xx for input
 * that was received but could not be understood.
 */
export class HttpConnection {
  private readonly socket: ITcpSocket;
  private readonly router: Router;
  private readonly config: ServerConfig;
  private readonly logger: Logger;
  private readonly parser: HttpRequestStreamParser;
  private readonly onStateChange?: (state: ConnectionState) => void;
  private _state: ConnectionState = "awaiting-request";

  constructor(options: HttpConnectionOptions) {
    this.socket = options.socket;
    this.router = options.router;
    this.config = options.config;
    this.logger = options.logger;
    this.onStateChange = options.onStateChange;
    this.parser = createHttpRequestParser(this.socket);
  }

  get state(): ConnectionState {
    return this._state;
  }

  /** Serve requests until the connection closes. Never rejects. */
  async run(): Promise<void> {
    try {
      while (this._state === "awaiting-request") {
        let request: HttpRequest;
        try {
          request = await this.parser.readRequest({
            maxHeaderSize: this.config.maxHeaderSize,
            maxBodySize: this.config.maxRequestBodySize,
            idleTimeoutMs: this.config.idleTimeoutMs,
            requestTimeoutMs: this.config.requestTimeoutMs,
          });
        } catch (err) {
          this.handleParseFailure(err);
          break;
        }

        this.transition("dispatching");
        if (!this.config.quiet) {
          const addr = this.socket.remoteAddress ?? "?";
          this.logger.info(`${request.method} ${request.target} - ${addr}`);
        }

        const keepAlive = await this.respond(request);
        this.transition("responded");

        if (!keepAlive) break;
        this.transition("awaiting-request");
      }
    } catch (err) {
      this.logger.error("Connection failed:", err);
    } finally {
      this.transition("closed");
      this.socket.close();
    }
  }

  /** Dispatch, negotiate and write one response. Returns whether to persist. */
  private async respond(request: HttpRequest): Promise<boolean> {
    const response = await this.dispatch(request);
    const keepAlive = shouldKeepAlive(
      request.httpVersion,
      request.headers,
      response,
    );

    const negotiated = this.config.compression
      ? negotiateContentEncoding(
          response,
          request.headers.get("accept-encoding"),
        )
      : response;

    const headers = new HeaderMap(negotiated.headers);
    headers.set("Connection", keepAlive ? "keep-alive" : "close");

    try {
      await sendResponseAndWait(this.socket, { ...negotiated, headers });
    } catch (err) {
      if (!(err instanceof HttpResponseSerializeError)) {
        this.logger.debug(`Write failed, closing: ${describeError(err)}`);
        return false;
      }

      this.logger.error(
        `Could not serialize response to ${request.method} ${request.target}:`,
        err,
      );
      await sendResponseAndWait(
        this.socket,
        plainResponse(500, { Connection: "close" }),
      );
      return false;
    }
    return keepAlive;
  }

  private async dispatch(request: HttpRequest): Promise<HttpResponse> {
    const resolution = this.router.resolve(request.method, request.path);

    switch (resolution.kind) {
      case "not-found":
        return plainResponse(404);
      case "method-not-allowed":
        return plainResponse(405, { Allow: resolution.allow.join(", ") });
      case "matched":
        try {
          return await resolution.handler({
            request,
            capture: resolution.capture,
          });
        } catch (err) {
          return this.handlerFailureResponse(request, err);
        }
    }
  }

  private handlerFailureResponse(
    request: HttpRequest,
    err: unknown,
  ): HttpResponse {
    if (err instanceof HandlerError) {
      if (err.status >= 500) {
        this.logger.error(
          `Handler failed for ${request.method} ${request.target}:`,
          err.cause ?? err,
        );
      }
      return {
        status: err.status,
        headers: { "Content-Type": "text/plain" },
        body: fromString(err.message),
      };
    }

    const code = fileErrorCode(err);
    if (code === "ENOENT" || code === "ENOTDIR") {
      return plainResponse(404);
    }

    this.logger.error(
      `Handler failed for ${request.method} ${request.target}:`,
      err,
    );
    return plainResponse(500);
  }

  private handleParseFailure(err: unknown): void {
    const status = classifyRequestParseFailure(err);
    if (status === "close") {
      this.logger.debug(
        `Closing connection from ${this.socket.remoteAddress ?? "?"}: ${describeError(err)}`,
      );
      return;
    }

    this.logger.warn(
      `Rejecting request from ${this.socket.remoteAddress ?? "?"} with ${status}: ${describeError(err)}`,
    );
    // Best effort: the peer may already be gone, and the socket drops writes then.
    sendResponse(this.socket, plainResponse(status, { Connection: "close" }));
  }

  private transition(next: ConnectionState): void {
    if (this._state === next || this._state === "closed") return;
    this._state = next;
    this.onStateChange?.(next);
  }
}

/**
 * Whether the connection should stay open after this exchange. HTTP/1.1
 * persists unless either side says `close`; older versions persist only
 * on an explicit `keep-alive`.
 */
export function shouldKeepAlive(
  httpVersion: string,
  requestHeaders: HeaderMap,
  response?: Pick<HttpResponse, "close" | "headers">,
): boolean {
  if (response?.close) return false;
  if (response?.headers) {
    const responseTokens = new HeaderMap(response.headers).tokens("connection");
    if (responseTokens.includes("close")) return false;
  }

  const tokens = requestHeaders.tokens("connection");
  if (tokens.includes("close")) return false;

  const [major, minor] = httpVersion.split(".").map((n) => Number.parseInt(n, 10));
  const predates11 = major < 1 || (major === 1 && minor < 1);
  if (predates11) {
    return tokens.includes("keep-alive");
  }
  return true;
}

export function classifyRequestParseFailure(
  err: unknown,
): 400 | 413 | 431 | "close" {
  if (!(err instanceof HttpRequestParseError)) {
    return 400;
  }

  switch (err.kind) {
    case "ConnectionClosed":
    case "Timeout":
      return "close";
    case "PayloadTooLarge":
      return err.code === "HEADERS_TOO_LARGE" ? 431 : 413;
    case "MalformedRequestLine":
      return 400;
  }
}

function plainResponse(
  status: number,
  extraHeaders?: Record<string, string>,
): HttpResponse {
  return {
    status,
    headers: { "Content-Type": "text/plain", ...extraHeaders },
    body: fromString(STATUS_TEXT[status] ?? String(status)),
  };
}

function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
