import {
  exact,
  HandlerError,
  prefix,
  type RouteContext,
  type RouteDefinition,
} from "../http/router.js";
import type { HttpResponse } from "../http/types.js";
import {
  fileErrorCode,
  type IFileHandle,
  type IFileSystem,
} from "../interfaces/filesystem.js";
import type { Logger } from "../logging/logger.js";
import { fromString } from "../utils/buffer.js";

export const WELCOME_MESSAGE = "Welcome to handwire!";

export interface DefaultRoutesOptions {
  fs: IFileSystem;
  /** Base directory for `/files/<name>`; null answers every file route with 404. */
  directory: string | null;
  logger?: Logger;
}

/**
 * The built-in route table:
 *
 * - `GET /` fixed welcome text
 * - `GET /echo/<value>` echoes the first segment of `<value>`
 * - `GET /user-agent` echoes the `User-Agent` header
 * - `GET /files/<name>` reads a file from the base directory
 * - `POST /files/<name>` writes the request body to a file
 */
export function createDefaultRoutes(
  options: DefaultRoutesOptions,
): RouteDefinition[] {
  const files = new FileRoutes(options);

  return [
    { method: "GET", pattern: exact("/"), handler: welcome },
    { method: "GET", pattern: prefix("/echo/"), handler: echo },
    { method: "GET", pattern: exact("/user-agent"), handler: userAgent },
    {
      method: "GET",
      pattern: prefix("/files/"),
      handler: (ctx) => files.read(ctx),
    },
    {
      method: "POST",
      pattern: prefix("/files/"),
      handler: (ctx) => files.write(ctx),
    },
  ];
}

function textResponse(status: number, text: string): HttpResponse {
  return {
    status,
    headers: { "Content-Type": "text/plain" },
    body: fromString(text),
    compressible: true,
  };
}

function welcome(): HttpResponse {
  return textResponse(200, WELCOME_MESSAGE);
}

// Only the first segment after `/echo/` is echoed.
function echo({ capture }: RouteContext): HttpResponse {
  const value = (capture ?? "").split("/")[0] ?? "";
  return textResponse(200, value);
}

function userAgent({ request }: RouteContext): HttpResponse {
  const agent = request.headers.get("user-agent");
  if (agent === undefined) {
    return textResponse(400, "Missing User-Agent header");
  }
  return textResponse(200, agent);
}

class FileRoutes {
  private readonly fs: IFileSystem;
  private readonly root: string | null;
  private readonly logger?: Logger;

  constructor(options: DefaultRoutesOptions) {
    this.fs = options.fs;
    this.root =
      options.directory === null ? null : trimTrailingSlashes(options.directory);
    this.logger = options.logger;
  }

  async read({ capture }: RouteContext): Promise<HttpResponse> {
    const filePath = this.resolve(capture);
    if (filePath === null) {
      return textResponse(404, "Not Found");
    }

    await this.assertInsideRoot(filePath);

    const stat = await this.fs.stat(filePath);
    if (!stat.isFile) {
      throw new HandlerError(404, "Not Found");
    }

    const handle = await this.fs.open(filePath, "r");
    let body: Uint8Array;
    try {
      body = await readAll(handle, stat.size);
    } finally {
      await handle.close();
    }

    return {
      status: 200,
      headers: { "Content-Type": "application/octet-stream" },
      body,
      compressible: true,
    };
  }

  async write({ capture, request }: RouteContext): Promise<HttpResponse> {
    const filePath = this.resolve(capture);
    if (filePath === null) {
      return textResponse(404, "Not Found");
    }

    const parent = parentDirectory(filePath);
    await this.assertInsideRoot(parent, { allowMissing: true });
    await this.assertInsideRoot(filePath, { allowMissing: true });

    try {
      await this.fs.mkdir(parent);
      const handle = await this.fs.open(filePath, "w");
      try {
        await writeAll(handle, request.body);
      } finally {
        await handle.close();
      }
    } catch (err) {
      throw new HandlerError(500, "Failed to write file", { cause: err });
    }

    this.logger?.debug(`Wrote ${request.body.length} bytes to ${filePath}`);

    const response = textResponse(201, "Resource created successfully");
    return {
      ...response,
      headers: {
        "Content-Type": "text/plain",
        Location: `/files/${capture ?? ""}`,
      },
    };
  }

  /**
   * Map a captured name to a path under the base directory. Returns null
   * when no directory is configured.
   */
  private resolve(capture: string | null): string | null {
    if (!capture) {
      throw new HandlerError(400, "File asked but no filename provided");
    }
    if (this.root === null) {
      return null;
    }

    let decoded: string;
    try {
      decoded = decodeURIComponent(capture);
    } catch (err) {
      throw new HandlerError(400, "Malformed file name", { cause: err });
    }
    if (decoded.includes("\0")) {
      throw new HandlerError(400, "Malformed file name");
    }

    const segments = decoded.split("/");
    if (segments.includes("..")) {
      throw new HandlerError(403, "Forbidden");
    }
    const kept = segments.filter((seg) => seg !== "" && seg !== ".");
    if (kept.length === 0) {
      throw new HandlerError(400, "File asked but no filename provided");
    }

    return joinPath(this.root, kept.join("/"));
  }

  // Symlinks may point anywhere; compare canonical paths. A missing path is
  // judged by its nearest existing ancestor.
  private async assertInsideRoot(
    filePath: string,
    options?: { allowMissing?: boolean },
  ): Promise<void> {
    if (this.root === null) return;

    let real: string | null = null;
    let current = filePath;
    while (real === null) {
      try {
        real = await this.fs.realpath(current);
      } catch (err) {
        const missing = fileErrorCode(err) === "ENOENT";
        if (!options?.allowMissing || !missing || current === "/") throw err;
        current = parentDirectory(current);
      }
    }

    const realRoot = trimTrailingSlashes(await this.fs.realpath(this.root));
    if (real !== realRoot && !real.startsWith(joinPath(realRoot, ""))) {
      throw new HandlerError(403, "Forbidden");
    }
  }
}

async function readAll(handle: IFileHandle, size: number): Promise<Uint8Array> {
  const buffer = new Uint8Array(size);
  let position = 0;
  while (position < size) {
    const { bytesRead } = await handle.read(
      buffer,
      position,
      size - position,
      position,
    );
    if (bytesRead === 0) break;
    position += bytesRead;
  }
  return buffer.subarray(0, position);
}

async function writeAll(handle: IFileHandle, data: Uint8Array): Promise<void> {
  let position = 0;
  while (position < data.length) {
    const { bytesWritten } = await handle.write(
      data,
      position,
      data.length - position,
      position,
    );
    if (bytesWritten === 0) {
      throw new Error("File handle accepted no bytes");
    }
    position += bytesWritten;
  }
}

function joinPath(directory: string, relative: string): string {
  return directory === "/" ? `/${relative}` : `${directory}/${relative}`;
}

function parentDirectory(path: string): string {
  return path.slice(0, path.lastIndexOf("/")) || "/";
}

function trimTrailingSlashes(path: string): string {
  const trimmed = path.replace(/\/+$/, "");
  return trimmed === "" ? "/" : trimmed;
}
