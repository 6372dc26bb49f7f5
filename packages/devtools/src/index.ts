/**
 * DevTools Package
 *
 * Inspector-facing surface of shadowtree:
 * - Inspector query and control API
 * - HTTP routes over that API
 * - SSE stream of timeline and lifecycle events
 */

export { Inspector, type InspectorSource } from "./inspector.js";
export { route, type RouteRequest, type RouteResponse } from "./server/routes.js";
export { SseHub, createHubSink, formatSse, type SseStream, type SsePayload } from "./server/sse-hub.js";
export { DevToolsServer, type DevToolsServerConfig } from "./server/devtools-server.js";
export { startDevToolsServer, type DevToolsOverrides } from "./server/start.js";
