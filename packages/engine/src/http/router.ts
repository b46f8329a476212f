import type { HttpMethod, HttpRequest, HttpResponse } from "./types.js";

/**
 * Route patterns are either an exact path or a prefix ending in `/` whose
 * remainder is captured (`/echo/` matches `/echo/abc` with capture `abc`).
 */
export type RoutePattern =
  | { kind: "exact"; path: string }
  | { kind: "prefix"; prefix: string };

export interface RouteContext {
  request: HttpRequest;
  /** Path remainder after a prefix pattern; null for exact patterns. */
  capture: string | null;
}

/**
 * Expected handler failure. The connection answers with `status` and the
 * error message as a plain-text body, then carries on as usual.
 */
export class HandlerError extends Error {
  constructor(
    readonly status: number,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "HandlerError";
  }
}

export type RouteHandler = (
  context: RouteContext,
) => HttpResponse | Promise<HttpResponse>;

export interface RouteDefinition {
  method: HttpMethod;
  pattern: RoutePattern;
  handler: RouteHandler;
}

export type RouteResolution =
  | { kind: "matched"; handler: RouteHandler; capture: string | null }
  | { kind: "method-not-allowed"; allow: HttpMethod[] }
  | { kind: "not-found" };

export function exact(path: string): RoutePattern {
  return { kind: "exact", path };
}

export function prefix(value: string): RoutePattern {
  if (!value.startsWith("/") || !value.endsWith("/")) {
    throw new Error(`Prefix pattern must start and end with "/": ${value}`);
  }
  return { kind: "prefix", prefix: value };
}

export function matchPattern(
  pattern: RoutePattern,
  path: string,
): { capture: string | null } | null {
  if (pattern.kind === "exact") {
    return path === pattern.path ? { capture: null } : null;
  }
  if (!path.startsWith(pattern.prefix)) {
    return null;
  }
  return { capture: path.slice(pattern.prefix.length) };
}

/**
 * Immutable route table. Resolution is a pure function of method and path,
 * so one router is shared by every connection.
 *
 * A path that matches some route only under other methods resolves to
 * `method-not-allowed`; a path no route matches resolves to `not-found`.
 */
export class Router {
  private readonly routes: readonly RouteDefinition[];

  constructor(routes: readonly RouteDefinition[]) {
    this.routes = Object.freeze(
      routes.map((route) => Object.freeze({ ...route })),
    );
  }

  resolve(method: HttpMethod, path: string): RouteResolution {
    const allow: HttpMethod[] = [];

    for (const route of this.routes) {
      const match = matchPattern(route.pattern, path);
      if (!match) continue;

      if (route.method === method) {
        return { kind: "matched", handler: route.handler, capture: match.capture };
      }
      if (!allow.includes(route.method)) {
        allow.push(route.method);
      }
    }

    return allow.length > 0
      ? { kind: "method-not-allowed", allow }
      : { kind: "not-found" };
  }
}
