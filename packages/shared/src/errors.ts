/**
 * Error Types
 *
 * Every error carries a stable `code` so callers can branch without
 * matching on messages.
 *
 * @module @shadowtree/shared/errors
 */

export type ShadowtreeErrorCode =
  | "CONFIG_INVALID"
  | "HOST_DISCONNECTED"
  | "SINK_NOT_READY"
  | "SESSION_NOT_FOUND";

/**
 * Base class for errors raised by shadowtree packages.
 */
export class ShadowtreeError extends Error {
  constructor(
    readonly code: ShadowtreeErrorCode,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "ShadowtreeError";
  }
}

/**
 * Configuration failed validation.
 */
export class ConfigError extends ShadowtreeError {
  constructor(readonly issues: string[]) {
    super("CONFIG_INVALID", `Invalid configuration: ${issues.join("; ")}`);
    this.name = "ConfigError";
  }
}

/**
 * The inspector-facing channel went away, typically during session teardown.
 */
export class HostDisconnectedError extends ShadowtreeError {
  constructor(message = "Inspector channel is disconnected", options?: { cause?: unknown }) {
    super("HOST_DISCONNECTED", message, options);
    this.name = "HostDisconnectedError";
  }
}

/**
 * The event sink exists but cannot accept events yet.
 */
export class SinkNotReadyError extends ShadowtreeError {
  constructor(message = "Event sink is not ready") {
    super("SINK_NOT_READY", message);
    this.name = "SinkNotReadyError";
  }
}

export class SessionNotFoundError extends ShadowtreeError {
  constructor(readonly sessionId: string) {
    super("SESSION_NOT_FOUND", `Session not found: ${sessionId}`);
    this.name = "SessionNotFoundError";
  }
}

export function isShadowtreeError(error: unknown): error is ShadowtreeError {
  return error instanceof ShadowtreeError;
}

export function isHostDisconnected(error: unknown): error is HostDisconnectedError {
  return error instanceof HostDisconnectedError;
}

export function isSinkNotReady(error: unknown): error is SinkNotReadyError {
  return error instanceof SinkNotReadyError;
}
