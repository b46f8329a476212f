import { describe, expect, it } from "vitest";
import { fileErrorCode } from "../interfaces/filesystem.js";
import { decodeToString, fromString } from "../utils/buffer.js";
import { InMemoryFileSystem } from "./in-memory-filesystem.js";

async function readAll(
  fs: InMemoryFileSystem,
  path: string,
): Promise<Uint8Array> {
  const stat = await fs.stat(path);
  const handle = await fs.open(path, "r");
  const buffer = new Uint8Array(stat.size);
  const { bytesRead } = await handle.read(buffer, 0, buffer.length, 0);
  await handle.close();
  return buffer.subarray(0, bytesRead);
}

async function codeOf(promise: Promise<unknown>): Promise<string | undefined> {
  return promise.then(
    () => undefined,
    (err: unknown) => fileErrorCode(err),
  );
}

describe("InMemoryFileSystem", () => {
  it("supports chunked positional writes", async () => {
    const fs = new InMemoryFileSystem();
    await fs.mkdir("/uploads");

    const handle = await fs.open("/uploads/data.bin", "w");

    const chunkA = fromString("hello ");
    const chunkB = fromString("chunked ");
    const chunkC = fromString("upload");

    let position = 0;
    await handle.write(chunkA, 0, chunkA.length, position);
    position += chunkA.length;
    await handle.write(chunkB, 0, chunkB.length, position);
    position += chunkB.length;
    await handle.write(chunkC, 0, chunkC.length, position);
    await handle.close();

    const file = await readAll(fs, "/uploads/data.bin");
    expect(decodeToString(file)).toBe("hello chunked upload");
    expect((await fs.stat("/uploads/data.bin")).size).toBe(file.length);
  });

  it("truncates when reopened for writing", async () => {
    const fs = new InMemoryFileSystem();
    await fs.writeFile("/a.txt", fromString("long original"));
    await fs.writeFile("/a.txt", fromString("new"));

    expect(decodeToString(await fs.readFile("/a.txt"))).toBe("new");
  });

  it("creates parent directories on write", async () => {
    const fs = new InMemoryFileSystem();
    await fs.writeFile("/a/b/c.txt", fromString("x"));

    expect((await fs.stat("/a/b")).isDirectory).toBe(true);
  });

  it("reports Node-style error codes", async () => {
    const fs = new InMemoryFileSystem();
    await fs.writeFile("/file", fromString("x"));

    expect(await codeOf(fs.stat("/missing"))).toBe("ENOENT");
    expect(await codeOf(fs.open("/missing", "r"))).toBe("ENOENT");
    expect(await codeOf(fs.open("/", "r"))).toBe("EISDIR");
    expect(await codeOf(fs.mkdir("/file/sub"))).toBe("ENOTDIR");
    expect(await codeOf(fs.realpath("/missing"))).toBe("ENOENT");
  });

  it("rejects writes to denied paths", async () => {
    const fs = new InMemoryFileSystem();
    fs.denyWrites("/locked");

    expect(await codeOf(fs.open("/locked", "w"))).toBe("EACCES");
  });

  it("refuses to use a closed handle", async () => {
    const fs = new InMemoryFileSystem();
    await fs.writeFile("/a.txt", fromString("x"));
    const handle = await fs.open("/a.txt", "r");
    await handle.close();

    expect(await codeOf(handle.read(new Uint8Array(1), 0, 1, 0))).toBe("EBADF");
  });

  it("resolves symlinks in realpath, stat and open", async () => {
    const fs = new InMemoryFileSystem();
    await fs.writeFile("/data/real.txt", fromString("target"));
    await fs.symlink("/data", "/alias");

    expect(await fs.realpath("/alias/real.txt")).toBe("/data/real.txt");
    expect((await fs.stat("/alias/real.txt")).size).toBe(6);
    expect(decodeToString(await readAll(fs, "/alias/real.txt"))).toBe("target");
  });

  it("normalizes relative segments", async () => {
    const fs = new InMemoryFileSystem();
    await fs.mkdir("/a/b");

    expect(await fs.realpath("/a/./b/../b/")).toBe("/a/b");
  });

  it("detects symlink loops", async () => {
    const fs = new InMemoryFileSystem();
    await fs.symlink("/loop-b", "/loop-a");
    await fs.symlink("/loop-a", "/loop-b");

    expect(await codeOf(fs.realpath("/loop-a"))).toBe("ELOOP");
  });
});
