/**
 * DevTools Server
 *
 * HTTP server that:
 * 1. Answers the inspector API (see {@link route})
 * 2. Streams timeline events to connected clients via SSE at `/events`
 * 3. Attaches itself as the sink of the lifecycle push channel, so pushed
 *    events buffer until a client connects
 */
import { createServer, type IncomingMessage, type Server, type ServerResponse } from "node:http";
import { Logger } from "@shadowtree/kernel";
import type { LifecycleEventChannel } from "@shadowtree/core";
import type { Inspector } from "../inspector.js";
import { route } from "./routes.js";
import { SseHub, createHubSink, formatSse } from "./sse-hub.js";

const log = Logger.for("DevToolsServer");

export interface DevToolsServerConfig {
  inspector: Inspector;
  /** Push channel to serve over SSE */
  channel?: LifecycleEventChannel | null;
  /** Port to listen on (default: 3001) */
  port?: number;
  /** Host to bind to (default: '127.0.0.1') */
  host?: string;
  /** Heartbeat interval in ms (default: 30000) */
  heartbeatInterval?: number;
}

export class DevToolsServer {
  private server: Server | null = null;
  private heartbeat: NodeJS.Timeout | null = null;
  private unsubscribe: (() => void) | null = null;
  private readonly hub = new SseHub();
  private readonly inspector: Inspector;
  private readonly channel: LifecycleEventChannel | null;
  private readonly port: number;
  private readonly host: string;
  private readonly heartbeatInterval: number;

  constructor(config: DevToolsServerConfig) {
    this.inspector = config.inspector;
    this.channel = config.channel ?? null;
    this.port = config.port ?? 3001;
    this.host = config.host ?? "127.0.0.1";
    this.heartbeatInterval = config.heartbeatInterval ?? 30000;
  }

  get isRunning(): boolean {
    return this.server !== null;
  }

  get clientCount(): number {
    return this.hub.size;
  }

  /**
   * Start the devtools server
   */
  start(): void {
    if (this.server) {
      log.debug("Server already running");
      return;
    }

    this.unsubscribe = this.inspector.subscribe((event) => {
      this.hub.broadcast({ type: "timeline", event });
    });
    this.channel?.attach(createHubSink(this.hub));

    this.server = createServer((req, res) => this.handleRequest(req, res));
    this.server.on("error", (error: NodeJS.ErrnoException) => {
      if (error.code === "EADDRINUSE") {
        log.warn({ port: this.port }, "Port already in use; DevTools disabled");
      } else {
        log.error({ err: error }, "Server error");
      }
      this.stop();
    });

    this.server.listen(this.port, this.host, () => {
      log.info({ url: this.getUrl() }, "Server listening");
    });

    this.heartbeat = setInterval(() => this.hub.heartbeat(), this.heartbeatInterval);
    this.heartbeat.unref();
  }

  /**
   * Stop the server
   */
  stop(): void {
    this.unsubscribe?.();
    this.unsubscribe = null;
    this.channel?.detach();

    if (this.heartbeat) {
      clearInterval(this.heartbeat);
      this.heartbeat = null;
    }
    this.hub.closeAll();

    if (this.server) {
      const server = this.server;
      this.server = null;
      server.close((error?: NodeJS.ErrnoException) => {
        if (error && error.code !== "ERR_SERVER_NOT_RUNNING") {
          log.debug({ err: error }, "Failed to close server");
        }
      });
    }
    log.debug("Server stopped");
  }

  /**
   * Get the server URL
   */
  getUrl(): string {
    return `http://${this.host}:${this.port}`;
  }

  private handleRequest(req: IncomingMessage, res: ServerResponse): void {
    const url = new URL(req.url ?? "/", this.getUrl());

    // CORS headers
    res.setHeader("Access-Control-Allow-Origin", "*");
    res.setHeader("Access-Control-Allow-Methods", "GET, POST, OPTIONS");
    res.setHeader("Access-Control-Allow-Headers", "Content-Type");

    if (req.method === "OPTIONS") {
      res.writeHead(204);
      res.end();
      return;
    }

    if (url.pathname === "/events") {
      this.handleSSE(res);
      return;
    }

    try {
      const response = route(this.inspector, {
        method: req.method ?? "GET",
        pathname: url.pathname,
        query: url.searchParams,
      });
      res.writeHead(response.status, { "Content-Type": "application/json" });
      res.end(JSON.stringify(response.body));
    } catch (error) {
      log.error({ err: error, path: url.pathname }, "Request failed");
      res.writeHead(500, { "Content-Type": "application/json" });
      res.end(JSON.stringify({ error: "INTERNAL", message: "Request failed" }));
    }
  }

  private handleSSE(res: ServerResponse): void {
    res.writeHead(200, {
      "Content-Type": "text/event-stream",
      "Cache-Control": "no-cache",
      Connection: "keep-alive",
    });
    res.write(formatSse({ type: "connected", timestamp: Date.now() }));

    const remove = this.hub.add(res);
    log.debug({ clients: this.hub.size }, "Client connected");
    this.channel?.flush();

    res.on("close", () => {
      remove();
      log.debug({ clients: this.hub.size }, "Client disconnected");
    });
  }
}
