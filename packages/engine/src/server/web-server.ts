import type { ServerConfig } from "../config/server-config.js";
import { type RouteDefinition, Router } from "../http/router.js";
import type { IFileSystem } from "../interfaces/filesystem.js";
import type {
  ISocketFactory,
  ITcpServer,
  ITcpSocket,
} from "../interfaces/socket.js";
import type { Logger } from "../logging/logger.js";
import { basicLogger } from "../logging/logger.js";
import { EventEmitter } from "../utils/event-emitter.js";
import { HttpConnection } from "./http-connection.js";
import { createDefaultRoutes } from "./routes.js";

export interface WebServerOptions {
  socketFactory: ISocketFactory;
  fileSystem: IFileSystem;
  config: ServerConfig;
  logger?: Logger;
  /** Replaces the built-in route table. */
  routes?: RouteDefinition[];
}

export type WebServerEvents = {
  listening: [port: number];
  close: [];
  error: [err: Error];
};

/** The listener could not acquire its port. */
export class BindError extends Error {
  constructor(
    readonly host: string,
    readonly port: number,
    options?: { cause?: unknown },
  ) {
    const reason =
      options?.cause instanceof Error ? `: ${options.cause.message}` : "";
    super(`Cannot listen on ${host}:${port}${reason}`, options);
    this.name = "BindError";
  }
}

/**
 * Accepts TCP connections and runs an independent {@link HttpConnection}
 * for each. Connections share only the immutable config and router.
 */
export class WebServer extends EventEmitter<WebServerEvents> {
  private socketFactory: ISocketFactory;
  private config: ServerConfig;
  private logger: Logger;
  private router: Router;
  private tcpServer: ITcpServer | null = null;
  private activeConnections: Set<ITcpSocket> = new Set();

  constructor(options: WebServerOptions) {
    super();
    this.socketFactory = options.socketFactory;
    this.config = Object.freeze({ ...options.config });
    this.logger = options.logger ?? basicLogger();

    this.router = new Router(
      options.routes ??
        createDefaultRoutes({
          fs: options.fileSystem,
          directory: this.config.directory,
          logger: this.logger,
        }),
    );
  }

  get connectionCount(): number {
    return this.activeConnections.size;
  }

  start(): Promise<number> {
    if (this.tcpServer) {
      return Promise.reject(new Error("Server is already started"));
    }

    return new Promise((resolve, reject) => {
      const server = this.socketFactory.createTcpServer();
      this.tcpServer = server;

      let settled = false;

      server.on("connection", (rawSocket) => {
        let socket: ITcpSocket;
        try {
          socket = this.socketFactory.wrapTcpSocket(rawSocket);
        } catch (err) {
          this.logger.error("Rejected incoming connection:", err);
          return;
        }
        void this.handleConnection(socket);
      });

      server.on("error", (err) => {
        if (!settled) {
          settled = true;
          this.tcpServer = null;
          reject(
            new BindError(this.config.host, this.config.port, { cause: err }),
          );
          return;
        }

        this.logger.error("TCP server error:", err);
        this.emit("error", err);
      });

      server.listen(this.config.port, this.config.host, () => {
        if (settled) return;
        settled = true;
        const addr = server.address();
        const port = addr?.port ?? this.config.port;
        this.emit("listening", port);
        resolve(port);
      });
    });
  }

  stop(): Promise<void> {
    return new Promise((resolve) => {
      const server = this.tcpServer;
      this.tcpServer = null;

      // Close all active connections
      for (const socket of this.activeConnections) {
        socket.close();
      }
      this.activeConnections.clear();

      if (!server) {
        this.emit("close");
        resolve();
        return;
      }

      server.close(() => {
        this.emit("close");
        resolve();
      });
    });
  }

  private async handleConnection(socket: ITcpSocket): Promise<void> {
    this.activeConnections.add(socket);

    socket.onClose(() => {
      this.activeConnections.delete(socket);
    });

    socket.onError(() => {
      this.activeConnections.delete(socket);
    });

    const connection = new HttpConnection({
      socket,
      router: this.router,
      config: this.config,
      logger: this.logger,
    });

    try {
      await connection.run();
    } finally {
      this.activeConnections.delete(socket);
    }
  }
}
