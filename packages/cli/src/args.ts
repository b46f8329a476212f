import { isLogLevel, type LogLevel } from "@handwire/engine";

export interface ServeOptions {
  directory: string | null;
  port: number;
  host: string;
  quiet: boolean;
  logLevel: LogLevel;
  idleTimeoutMs?: number;
  compression: boolean;
}

export type CliCommand =
  | { kind: "serve"; options: ServeOptions }
  | { kind: "help" }
  | { kind: "version" };

/** Bad flags or flag values. The caller prints it with the help text. */
export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CliUsageError";
  }
}

export const HELP_TEXT = `
handwire - a small HTTP/1.1 server

Usage: handwire [directory] [options]

Options:
  --directory, -d <dir>    Base directory for /files/<name>
  --port, -p <port>        Port to listen on (default: 4221)
  --host, -H <host>        Host to bind (default: 127.0.0.1)
  --quiet, -q              Suppress request logging
  --log-level <level>      debug, info, warn or error (default: info)
  --idle-timeout <ms>      Close kept-alive connections idle this long
  --no-compression         Never gzip or deflate responses
  --version, -v            Show version
  --help, -h               Show this help
`;

export function parseArgs(args: readonly string[]): CliCommand {
  const options: ServeOptions = {
    directory: null,
    port: 4221,
    host: "127.0.0.1",
    quiet: false,
    logLevel: "info",
    compression: true,
  };

  let i = 0;
  const valueFor = (flag: string): string => {
    const value = args[++i];
    if (value === undefined || value.startsWith("-")) {
      throw new CliUsageError(`Missing value for ${flag}`);
    }
    return value;
  };

  while (i < args.length) {
    const arg = args[i];
    if (arg === "--port" || arg === "-p") {
      options.port = parsePort(valueFor(arg));
    } else if (arg === "--host" || arg === "-H") {
      options.host = valueFor(arg);
    } else if (arg === "--directory" || arg === "-d") {
      options.directory = valueFor(arg);
    } else if (arg === "--quiet" || arg === "-q") {
      options.quiet = true;
    } else if (arg === "--log-level") {
      const level = valueFor(arg);
      if (!isLogLevel(level)) {
        throw new CliUsageError(`Invalid log level: ${level}`);
      }
      options.logLevel = level;
    } else if (arg === "--idle-timeout") {
      options.idleTimeoutMs = parseMilliseconds(valueFor(arg));
    } else if (arg === "--no-compression") {
      options.compression = false;
    } else if (arg === "--version" || arg === "-v") {
      return { kind: "version" };
    } else if (arg === "--help" || arg === "-h") {
      return { kind: "help" };
    } else if (!arg.startsWith("-")) {
      if (options.directory !== null) {
        throw new CliUsageError(`Unexpected argument: ${arg}`);
      }
      options.directory = arg;
    } else {
      throw new CliUsageError(`Unknown option: ${arg}`);
    }
    i++;
  }

  return { kind: "serve", options };
}

function parsePort(value: string): number {
  const port = Number(value);
  if (!/^\d+$/.test(value) || port > 65535) {
    throw new CliUsageError(`Invalid port number: ${value}`);
  }
  return port;
}

function parseMilliseconds(value: string): number {
  if (!/^\d+$/.test(value) || Number(value) === 0) {
    throw new CliUsageError(`Invalid timeout: ${value}`);
  }
  return Number(value);
}
