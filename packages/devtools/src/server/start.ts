/**
 * Convenience function to start DevTools server
 */
import type { Shadowtree } from "@shadowtree/core";
import { Inspector } from "../inspector.js";
import { DevToolsServer, type DevToolsServerConfig } from "./devtools-server.js";

export type DevToolsOverrides = Partial<Omit<DevToolsServerConfig, "inspector" | "channel">>;

/**
 * Start a DevTools server for an engine. Port and host default to the
 * engine's `server` configuration.
 *
 * @example
 * ```typescript
 * import { createShadowtree } from '@shadowtree/core';
 * import { startDevToolsServer } from '@shadowtree/devtools';
 *
 * const engine = createShadowtree();
 * const server = startDevToolsServer(engine);
 *
 * // Later...
 * server.stop();
 * ```
 */
export function startDevToolsServer(
  engine: Shadowtree,
  overrides: DevToolsOverrides = {},
): DevToolsServer {
  const server = new DevToolsServer({
    inspector: new Inspector(engine),
    channel: engine.channel,
    port: overrides.port ?? engine.config.server.port,
    host: overrides.host ?? engine.config.server.host,
    heartbeatInterval: overrides.heartbeatInterval,
  });
  server.start();
  return server;
}
