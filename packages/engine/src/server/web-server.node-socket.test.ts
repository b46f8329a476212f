import * as fs from "node:fs/promises";
import * as net from "node:net";
import * as os from "node:os";
import * as path from "node:path";
import { afterAll, describe, expect, it } from "vitest";
import { defaultConfig } from "../config/server-config.js";
import { LogStore, storeLogger } from "../logging/logger.js";
import { createNodeServer } from "../presets/node.js";
import { BindError } from "./web-server.js";

const itSocket = process.env.HANDWIRE_SOCKET_TESTS === "1" ? it : it.skip;

let tmpDir: string | null = null;

afterAll(async () => {
  if (tmpDir) {
    await fs.rm(tmpDir, { recursive: true, force: true });
  }
});

/** Write raw bytes to a local port and collect everything until the peer closes. */
function rawExchange(port: number, payload: string): Promise<string> {
  return new Promise((resolve, reject) => {
    const chunks: Buffer[] = [];
    const socket = net.connect(port, "127.0.0.1", () => socket.write(payload));
    socket.on("data", (chunk: Buffer) => chunks.push(chunk));
    socket.on("error", reject);
    socket.on("close", () => resolve(Buffer.concat(chunks).toString("utf8")));
  });
}

describe("WebServer Node adapter (real socket)", () => {
  itSocket(
    "binds to an ephemeral port and serves file requests",
    async () => {
      tmpDir = await fs.mkdtemp(path.join(os.tmpdir(), "handwire-node-socket-"));

      const server = createNodeServer({
        config: { ...defaultConfig(tmpDir), port: 0, quiet: true },
        logger: storeLogger(new LogStore()),
      });

      const port = await server.start();
      try {
        const created = await fetch(`http://127.0.0.1:${port}/files/hello.txt`, {
          method: "POST",
          body: "hello",
        });
        expect(created.status).toBe(201);

        const res = await fetch(`http://127.0.0.1:${port}/files/hello.txt`);
        expect(res.status).toBe(200);
        expect(await res.text()).toBe("hello");
      } finally {
        await server.stop();
      }
    },
    10000,
  );

  itSocket(
    "answers a malformed request with 400 and closes",
    async () => {
      const server = createNodeServer({
        config: { ...defaultConfig(), port: 0, quiet: true },
        logger: storeLogger(new LogStore()),
      });

      const port = await server.start();
      try {
        const response = await rawExchange(port, "GARBAGE\r\n\r\n");
        expect(response).toBe(
          "HTTP/1.1 400 Bad Request\r\nContent-Type: text/plain\r\nConnection: close\r\nContent-Length: 11\r\n\r\nBad Request",
        );
      } finally {
        await server.stop();
      }
    },
    10000,
  );

  itSocket(
    "rejects with a BindError when the port is taken",
    async () => {
      const first = createNodeServer({
        config: { ...defaultConfig(), port: 0, quiet: true },
        logger: storeLogger(new LogStore()),
      });
      const port = await first.start();

      const second = createNodeServer({
        config: { ...defaultConfig(), port, quiet: true },
        logger: storeLogger(new LogStore()),
      });
      try {
        await expect(second.start()).rejects.toBeInstanceOf(BindError);
      } finally {
        await first.stop();
      }
    },
    10000,
  );
});
