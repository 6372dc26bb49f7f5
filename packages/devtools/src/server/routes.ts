/**
 * HTTP routes of the inspector API, as a pure function of the request so
 * they can be exercised without a socket.
 *
 * | Method | Path                                          | Operation               |
 * | ------ | --------------------------------------------- | ----------------------- |
 * | GET    | `/api/state`                                  | `getState`              |
 * | POST   | `/api/recording/start`                        | `startRecording`        |
 * | POST   | `/api/recording/stop`                         | `stopRecording`         |
 * | POST   | `/api/events/clear`                           | `clearEvents`           |
 * | POST   | `/api/max-events?value=N`                     | `setMaxEvents`          |
 * | GET    | `/api/events`                                 | `getEvents`             |
 * | GET    | `/api/events?since=ID`                        | `getEventsSince`        |
 * | GET    | `/api/events?start=MS&end=MS`                 | `getEventsInRange`      |
 * | GET    | `/api/events?componentId=ID`                  | `getEventsForComponent` |
 * | GET    | `/api/batches`                                | `getBatches`            |
 * | GET    | `/api/ranking`                                | `getRankedComponents`   |
 * | GET    | `/api/sessions`                               | `getSessionIds`         |
 * | GET    | `/api/sessions/:session/components`           | `getAllComponents`      |
 * | GET    | `/api/sessions/:session/components/:id`       | `getComponent`          |
 * | GET    | `/api/sessions/:session/components/:id/tree`  | `getSubtree`            |
 * | GET    | `/api/sessions/:session/counts`               | `getCounts`             |
 *
 * @module @shadowtree/devtools/server/routes
 */

import { z } from "zod";
import { isShadowtreeError } from "@shadowtree/shared";
import type { Inspector } from "../inspector.js";

export interface RouteRequest {
  method: string;
  pathname: string;
  query: URLSearchParams;
}

export interface RouteResponse {
  status: number;
  body: unknown;
}

// ============================================================================
// Query schemas
// ============================================================================

const ComponentIdSchema = z.coerce.number().int().nonnegative();

const EventQuerySchema = z
  .object({
    since: z.coerce.number().int().optional(),
    start: z.coerce.number().optional(),
    end: z.coerce.number().optional(),
    componentId: z.coerce.number().int().optional(),
  })
  .refine((query) => (query.start === undefined) === (query.end === undefined), {
    message: "start and end must be given together",
    path: ["start"],
  });

const MaxEventsQuerySchema = z.object({
  value: z.coerce.number().finite(),
});

// ============================================================================
// Routing
// ============================================================================

const SESSION_PATH = /^\/api\/sessions\/([^/]+)\/(components|counts)(?:\/([^/]+)(\/tree)?)?$/;

function ok(body: unknown): RouteResponse {
  return { status: 200, body };
}

function notFound(message: string): RouteResponse {
  return { status: 404, body: { error: "NOT_FOUND", message } };
}

function badRequest(issues: string[]): RouteResponse {
  return { status: 400, body: { error: "BAD_REQUEST", issues } };
}

function methodNotAllowed(method: string, pathname: string): RouteResponse {
  return { status: 405, body: { error: "METHOD_NOT_ALLOWED", message: `${method} ${pathname}` } };
}

function queryObject(query: URLSearchParams): Record<string, string> {
  return Object.fromEntries(query.entries());
}

function only(method: string, request: RouteRequest, handle: () => RouteResponse): RouteResponse {
  return request.method === method ? handle() : methodNotAllowed(request.method, request.pathname);
}

function handleEvents(inspector: Inspector, query: URLSearchParams): RouteResponse {
  const parsed = EventQuerySchema.parse(queryObject(query));
  if (parsed.since !== undefined) return ok(inspector.getEventsSince(parsed.since));
  if (parsed.start !== undefined && parsed.end !== undefined) {
    return ok(inspector.getEventsInRange(parsed.start, parsed.end));
  }
  if (parsed.componentId !== undefined) return ok(inspector.getEventsForComponent(parsed.componentId));
  return ok(inspector.getEvents());
}

function decodeSegment(segment: string): string | null {
  try {
    return decodeURIComponent(segment);
  } catch (error) {
    if (error instanceof URIError) return null;
    throw error;
  }
}

function handleSession(inspector: Inspector, match: RegExpExecArray): RouteResponse {
  const sessionId = decodeSegment(match[1]);
  if (sessionId === null) return badRequest(["session: malformed percent-encoding"]);
  const resource = match[2];
  const rawComponentId: string | undefined = match[3];
  const tree = match[4] !== undefined;

  if (resource === "counts") {
    return rawComponentId === undefined
      ? ok(inspector.getCounts(sessionId))
      : notFound("Unknown resource under counts");
  }
  if (rawComponentId === undefined) {
    return ok(inspector.getAllComponents(sessionId));
  }

  const componentId = ComponentIdSchema.parse(rawComponentId);
  const body = tree
    ? inspector.getSubtree(sessionId, componentId)
    : inspector.getComponent(sessionId, componentId);
  return body === null ? notFound(`Component not found: ${componentId}`) : ok(body);
}

function dispatch(inspector: Inspector, request: RouteRequest): RouteResponse {
  switch (request.pathname) {
    case "/api/state":
      return only("GET", request, () => ok(inspector.getState()));
    case "/api/recording/start":
      return only("POST", request, () => ok(inspector.startRecording()));
    case "/api/recording/stop":
      return only("POST", request, () => ok(inspector.stopRecording()));
    case "/api/events/clear":
      return only("POST", request, () => ok(inspector.clearEvents()));
    case "/api/max-events":
      return only("POST", request, () => {
        const { value } = MaxEventsQuerySchema.parse(queryObject(request.query));
        return ok({ maxEvents: inspector.setMaxEvents(value) });
      });
    case "/api/events":
      return only("GET", request, () => handleEvents(inspector, request.query));
    case "/api/batches":
      return only("GET", request, () => ok(inspector.getBatches()));
    case "/api/ranking":
      return only("GET", request, () => ok(inspector.getRankedComponents()));
    case "/api/sessions":
      return only("GET", request, () => ok(inspector.getSessionIds()));
  }

  const match = SESSION_PATH.exec(request.pathname);
  if (match) {
    return only("GET", request, () => handleSession(inspector, match));
  }
  return notFound(`No route for ${request.pathname}`);
}

/**
 * Answer one inspector request. Validation failures and malformed path
 * encoding map to 400; unknown
 * sessions or components to 404; anything else is rethrown.
 */
export function route(inspector: Inspector, request: RouteRequest): RouteResponse {
  try {
    return dispatch(inspector, request);
  } catch (error) {
    if (error instanceof z.ZodError) {
      return badRequest(
        error.issues.map((issue) => `${issue.path.join(".") || "value"}: ${issue.message}`),
      );
    }
    if (isShadowtreeError(error) && error.code === "SESSION_NOT_FOUND") {
      return { status: 404, body: { error: error.code, message: error.message } };
    }
    throw error;
  }
}
