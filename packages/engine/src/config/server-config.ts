export interface ServerConfig {
  /** Port to listen on. Default: 4221 */
  port: number;
  /** Host/IP to bind. Default: '127.0.0.1' */
  host: string;
  /** Base directory for `/files/<name>`. Null disables the route. */
  directory: string | null;
  /** Suppress request logging. Default: false */
  quiet: boolean;
  /** How long a kept-alive connection may wait for its next request. Default: 15000ms */
  idleTimeoutMs: number;
  /** Max time allowed for receiving a full HTTP request once it has started. Default: 5000ms */
  requestTimeoutMs: number;
  /** Max size of the request line plus headers. Default: 8KB */
  maxHeaderSize: number;
  /** Max declared request body size. Default: 10MB */
  maxRequestBodySize: number;
  /** Negotiate gzip/deflate for compressible responses. Default: true */
  compression: boolean;
}

export function defaultConfig(directory: string | null = null): ServerConfig {
  return {
    port: 4221,
    host: "127.0.0.1",
    directory,
    quiet: false,
    idleTimeoutMs: 15_000,
    requestTimeoutMs: 5000,
    maxHeaderSize: 8 * 1024,
    maxRequestBodySize: 10 * 1024 * 1024,
    compression: true,
  };
}
