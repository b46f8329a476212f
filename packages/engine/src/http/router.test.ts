import { describe, expect, it } from "vitest";
import { exact, matchPattern, prefix, type RouteHandler, Router } from "./router.js";

const ok: RouteHandler = () => ({ status: 200 });
const created: RouteHandler = () => ({ status: 201 });

describe("matchPattern", () => {
  it("matches exact paths only", () => {
    expect(matchPattern(exact("/user-agent"), "/user-agent")).toEqual({ capture: null });
    expect(matchPattern(exact("/user-agent"), "/user-agent/")).toBeNull();
  });

  it("captures the remainder after a prefix", () => {
    expect(matchPattern(prefix("/echo/"), "/echo/abc/def")).toEqual({
      capture: "abc/def",
    });
    expect(matchPattern(prefix("/echo/"), "/echo/")).toEqual({ capture: "" });
    expect(matchPattern(prefix("/echo/"), "/echo")).toBeNull();
  });
});

describe("prefix", () => {
  it("requires a leading and trailing slash", () => {
    expect(() => prefix("/echo")).toThrow('Prefix pattern must start and end with "/": /echo');
    expect(() => prefix("echo/")).toThrow();
  });
});

describe("Router", () => {
  const router = new Router([
    { method: "GET", pattern: exact("/"), handler: ok },
    { method: "GET", pattern: prefix("/files/"), handler: ok },
    { method: "POST", pattern: prefix("/files/"), handler: created },
  ]);

  it("resolves a route by method and path", () => {
    const resolution = router.resolve("POST", "/files/a.txt");

    expect(resolution).toEqual({ kind: "matched", handler: created, capture: "a.txt" });
  });

  it("reports the allowed methods for a path matched under another method", () => {
    expect(router.resolve("POST", "/")).toEqual({
      kind: "method-not-allowed",
      allow: ["GET"],
    });
  });

  it("reports not-found when no route matches the path", () => {
    expect(router.resolve("GET", "/nope")).toEqual({ kind: "not-found" });
  });

  it("prefers the first matching route", () => {
    const first: RouteHandler = () => ({ status: 204 });
    const shadowing = new Router([
      { method: "GET", pattern: prefix("/a/"), handler: first },
      { method: "GET", pattern: exact("/a/b"), handler: ok },
    ]);

    const resolution = shadowing.resolve("GET", "/a/b");
    expect(resolution.kind === "matched" && resolution.handler).toBe(first);
  });

  it("is unaffected by later changes to the input table", () => {
    const routes = [{ method: "GET" as const, pattern: exact("/"), handler: ok }];
    const frozen = new Router(routes);
    routes.pop();

    expect(frozen.resolve("GET", "/").kind).toBe("matched");
  });
});
