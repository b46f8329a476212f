/**
 * Abstract file system interfaces used by the `/files` handler. Errors
 * thrown by implementations carry a Node-style `code` (`ENOENT`, `EISDIR`,
 * ...) so callers can tell a missing file from a real failure.
 */

export interface IFileStat {
  size: number
  mtime: Date
  isDirectory: boolean
  isFile: boolean
}

export interface IFileHandle {
  /** Read data from the file at a specific position. */
  read(
    buffer: Uint8Array,
    offset: number,
    length: number,
    position: number,
  ): Promise<{ bytesRead: number }>

  /** Write data to the file at a specific position. */
  write(
    buffer: Uint8Array,
    offset: number,
    length: number,
    position: number,
  ): Promise<{ bytesWritten: number }>

  /** Close the file handle. */
  close(): Promise<void>
}

export interface IFileSystem {
  /**
   * Open a file. Mode `w` truncates or creates the file, creating missing
   * parent directories.
   */
  open(path: string, mode: 'r' | 'w'): Promise<IFileHandle>

  /** Get file statistics. */
  stat(path: string): Promise<IFileStat>

  /** Create a directory and any missing parents. */
  mkdir(path: string): Promise<void>

  /** Resolve symlinks and relative segments to a canonical path. */
  realpath(path: string): Promise<string>
}

/** The `code` of a file system error, if it has one. */
export function fileErrorCode(err: unknown): string | undefined {
  if (typeof err !== 'object' || err === null || !('code' in err)) {
    return undefined
  }
  return typeof err.code === 'string' ? err.code : undefined
}
