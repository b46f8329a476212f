import { gunzipSync, inflateSync } from "node:zlib";
import { describe, expect, it } from "vitest";
import { decodeToString, fromString } from "../utils/buffer.js";
import {
  negotiateContentEncoding,
  parseAcceptEncoding,
  selectEncoding,
} from "./content-negotiation.js";
import { HeaderMap } from "./headers.js";
import type { HttpResponse } from "./types.js";

function compressibleText(text: string): HttpResponse {
  return {
    status: 200,
    headers: { "Content-Type": "text/plain" },
    body: fromString(text),
    compressible: true,
  };
}

describe("parseAcceptEncoding", () => {
  it("reads codings with their quality values", () => {
    const accepted = parseAcceptEncoding("GZIP;q=0.5, deflate, br;q=0");

    expect([...accepted]).toEqual([
      ["gzip", 0.5],
      ["deflate", 1],
      ["br", 0],
    ]);
  });

  it("treats an unparsable quality as 1", () => {
    expect(parseAcceptEncoding("gzip;q=abc").get("gzip")).toBe(1);
  });

  it("returns an empty map for a missing header", () => {
    expect(parseAcceptEncoding(undefined).size).toBe(0);
  });
});

describe("selectEncoding", () => {
  it.each([
    ["gzip", "gzip"],
    ["deflate", "deflate"],
    ["deflate, gzip", "gzip"],
    ["gzip;q=0, deflate", "deflate"],
    ["*", "gzip"],
    ["*, gzip;q=0", "deflate"],
    ["br", null],
    ["gzip;q=0, deflate;q=0", null],
    ["", null],
  ] as const)("selects %j as %s", (header, expected) => {
    expect(selectEncoding(header)).toBe(expected);
  });
});

describe("negotiateContentEncoding", () => {
  it("gzips a compressible body the client accepts", () => {
    const response = compressibleText("hello hello hello");
    const negotiated = negotiateContentEncoding(response, "gzip");

    const headers = new HeaderMap(negotiated.headers);
    expect(headers.get("content-encoding")).toBe("gzip");
    expect(headers.get("content-type")).toBe("text/plain");
    expect(negotiated.body).toBeDefined();
    expect(decodeToString(gunzipSync(negotiated.body ?? new Uint8Array(0)))).toBe(
      "hello hello hello",
    );
  });

  it("deflates when deflate is the only accepted coding", () => {
    const negotiated = negotiateContentEncoding(compressibleText("abc"), "deflate");

    expect(new HeaderMap(negotiated.headers).get("content-encoding")).toBe("deflate");
    expect(decodeToString(inflateSync(negotiated.body ?? new Uint8Array(0)))).toBe("abc");
  });

  it("does not mutate the input response", () => {
    const response = compressibleText("abc");
    negotiateContentEncoding(response, "gzip");

    expect(response.headers).toEqual({ "Content-Type": "text/plain" });
    expect(decodeToString(response.body ?? new Uint8Array(0))).toBe("abc");
  });

  it("returns the same response when nothing is accepted", () => {
    const response = compressibleText("abc");

    expect(negotiateContentEncoding(response, undefined)).toBe(response);
    expect(negotiateContentEncoding(response, "br")).toBe(response);
  });

  it("leaves responses that are not compressible alone", () => {
    const response: HttpResponse = { status: 200, body: fromString("abc") };

    expect(negotiateContentEncoding(response, "gzip")).toBe(response);
  });

  it("leaves empty bodies alone", () => {
    const response: HttpResponse = { status: 201, compressible: true };

    expect(negotiateContentEncoding(response, "gzip")).toBe(response);
  });

  it("never encodes twice", () => {
    const once = negotiateContentEncoding(compressibleText("abc"), "gzip");
    const twice = negotiateContentEncoding(once, "gzip");

    expect(twice).toBe(once);
  });

  it("produces identical bytes for identical input", () => {
    const a = negotiateContentEncoding(compressibleText("repeat"), "gzip");
    const b = negotiateContentEncoding(compressibleText("repeat"), "gzip");

    expect(a.body).toEqual(b.body);
  });
});
