import * as fs from "node:fs/promises";
import * as path from "node:path";
import type {
  IFileHandle,
  IFileStat,
  IFileSystem,
} from "../../interfaces/filesystem.js";

export class NodeFileHandle implements IFileHandle {
  constructor(private handle: fs.FileHandle) {}

  async read(
    buffer: Uint8Array,
    offset: number,
    length: number,
    position: number,
  ): Promise<{ bytesRead: number }> {
    const result = await this.handle.read(buffer, offset, length, position);
    return { bytesRead: result.bytesRead };
  }

  async write(
    buffer: Uint8Array,
    offset: number,
    length: number,
    position: number,
  ): Promise<{ bytesWritten: number }> {
    const result = await this.handle.write(buffer, offset, length, position);
    return { bytesWritten: result.bytesWritten };
  }

  async close(): Promise<void> {
    await this.handle.close();
  }
}

/** {@link IFileSystem} over `node:fs/promises`. Errors keep Node's `code`. */
export class NodeFileSystem implements IFileSystem {
  async open(filePath: string, mode: "r" | "w"): Promise<IFileHandle> {
    if (mode === "w") {
      await fs.mkdir(path.dirname(filePath), { recursive: true });
    }

    const handle = await fs.open(filePath, mode);
    return new NodeFileHandle(handle);
  }

  async stat(filePath: string): Promise<IFileStat> {
    const stats = await fs.stat(filePath);
    return {
      size: stats.size,
      mtime: stats.mtime,
      isDirectory: stats.isDirectory(),
      isFile: stats.isFile(),
    };
  }

  async mkdir(dirPath: string): Promise<void> {
    await fs.mkdir(dirPath, { recursive: true });
  }

  async realpath(filePath: string): Promise<string> {
    return fs.realpath(filePath);
  }
}
