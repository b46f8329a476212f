#!/usr/bin/env node
import * as fs from "node:fs/promises";
import * as path from "node:path";
import {
  BindError,
  basicLogger,
  createNodeServer,
  defaultConfig,
  filteredLogger,
  type Logger,
  prefixedLogger,
  type ServerConfig,
} from "@handwire/engine";
import { CliUsageError, HELP_TEXT, parseArgs, type ServeOptions } from "./args.js";

async function readVersion(): Promise<string> {
  const manifest = new URL("../package.json", import.meta.url);
  const parsed: unknown = JSON.parse(await fs.readFile(manifest, "utf8"));
  if (
    typeof parsed === "object" &&
    parsed !== null &&
    "version" in parsed &&
    typeof parsed.version === "string"
  ) {
    return parsed.version;
  }
  return "unknown";
}

function createLogger(options: ServeOptions): Logger {
  if (options.quiet) {
    return {
      debug: () => {},
      info: () => {},
      warn: console.warn,
      error: console.error,
    };
  }
  return prefixedLogger("handwire", filteredLogger(options.logLevel, basicLogger()));
}

async function resolveDirectory(directory: string | null): Promise<string | null> {
  if (directory === null) return null;

  const resolved = path.resolve(directory);
  let isDirectory = false;
  try {
    isDirectory = (await fs.stat(resolved)).isDirectory();
  } catch (err) {
    throw new Error(`Directory does not exist: ${resolved}`, { cause: err });
  }
  if (!isDirectory) {
    throw new Error(`Not a directory: ${resolved}`);
  }
  return resolved;
}

async function serve(options: ServeOptions): Promise<void> {
  const directory = await resolveDirectory(options.directory);
  const logger = createLogger(options);

  const config: ServerConfig = {
    ...defaultConfig(directory),
    port: options.port,
    host: options.host,
    quiet: options.quiet,
    compression: options.compression,
  };
  if (options.idleTimeoutMs !== undefined) {
    config.idleTimeoutMs = options.idleTimeoutMs;
  }

  const server = createNodeServer({ config, logger });
  server.on("error", (err) => logger.error("Server error:", err));

  const port = await server.start();

  const url = `http://${config.host === "0.0.0.0" ? "localhost" : config.host}:${port}`;
  console.log(`\n  handwire serving ${directory ?? "(no directory)"}\n`);
  console.log(`  Local:   ${url}`);
  if (config.host === "0.0.0.0") {
    console.log(`  Network: http://0.0.0.0:${port}`);
  }
  console.log();

  const shutdown = async () => {
    console.log("\nShutting down...");
    await server.stop();
    process.exit(0);
  };

  process.on("SIGINT", () => void shutdown());
  process.on("SIGTERM", () => void shutdown());
}

async function main(): Promise<void> {
  const command = parseArgs(process.argv.slice(2));

  switch (command.kind) {
    case "help":
      console.log(HELP_TEXT);
      return;
    case "version":
      console.log(await readVersion());
      return;
    case "serve":
      await serve(command.options);
  }
}

main().catch((err: unknown) => {
  if (err instanceof CliUsageError) {
    console.error(err.message);
    console.error(HELP_TEXT);
  } else if (err instanceof BindError) {
    console.error(err.message);
  } else {
    console.error("Fatal error:", err);
  }
  process.exit(1);
});
