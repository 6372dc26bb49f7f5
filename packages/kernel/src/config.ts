/**
 * Engine Configuration
 *
 * Validated with zod. Every section is optional in the input and filled with
 * defaults; environment variables override the input.
 *
 * | Variable                  | Key                       |
 * | ------------------------- | ------------------------- |
 * | `SHADOWTREE_TIMING`       | `timing.enabled`          |
 * | `SHADOWTREE_MAX_EVENTS`   | `timeline.maxEvents`      |
 * | `SHADOWTREE_RECONCILE_MS` | `reconcile.minIntervalMs` |
 * | `SHADOWTREE_PUSH`         | `push.enabled`            |
 * | `SHADOWTREE_LOG_LEVEL`    | `log.level`               |
 * | `SHADOWTREE_PORT`         | `server.port`             |
 *
 * @module @shadowtree/kernel/config
 */

import { z } from "zod";
import { ConfigError, parseEventKind } from "@shadowtree/shared";
import { LOG_LEVELS } from "./logger.js";

// ============================================================================
// Schema
// ============================================================================

export const ShadowtreeConfigSchema = z.object({
  timing: z
    .object({
      /** Collect phase durations for Enhanced components */
      enabled: z.boolean().default(true),
    })
    .default({}),
  timeline: z
    .object({
      maxEvents: z.number().int().positive().default(5000),
      maxBatches: z.number().int().positive().default(500),
    })
    .default({}),
  reconcile: z
    .object({
      /** Minimum time between two reconciliation passes of one session */
      minIntervalMs: z.number().nonnegative().default(250),
    })
    .default({}),
  push: z
    .object({
      enabled: z.boolean().default(false),
      /** Events with a positive duration below this are not pushed */
      minDurationMs: z.number().nonnegative().default(0),
      /** Event kind names to push; all kinds when absent */
      kinds: z
        .array(z.string())
        .refine((names) => names.every((name) => parseEventKind(name) !== undefined), {
          message: "Unknown event kind",
        })
        .optional(),
      excludedTypes: z.array(z.string()).default([]),
      /** Events held while no sink is attached */
      maxBuffered: z.number().int().positive().default(100),
    })
    .default({}),
  log: z
    .object({
      level: z.enum(LOG_LEVELS).default("info"),
    })
    .default({}),
  server: z
    .object({
      port: z.number().int().min(0).max(65535).default(3001),
      host: z.string().min(1).default("127.0.0.1"),
    })
    .default({}),
});

export type ShadowtreeConfig = z.output<typeof ShadowtreeConfigSchema>;
export type ShadowtreeConfigInput = z.input<typeof ShadowtreeConfigSchema>;

// ============================================================================
// Loading
// ============================================================================

function parseFlag(name: string, value: string): boolean {
  const normalized = value.trim().toLowerCase();
  if (normalized === "true" || normalized === "1") return true;
  if (normalized === "false" || normalized === "0") return false;
  throw new ConfigError([`${name}: expected true or false, got "${value}"`]);
}

function parseNumber(name: string, value: string): number {
  const parsed = Number(value);
  if (value.trim() === "" || Number.isNaN(parsed)) {
    throw new ConfigError([`${name}: expected a number, got "${value}"`]);
  }
  return parsed;
}

function applyEnv(input: ShadowtreeConfigInput, env: NodeJS.ProcessEnv): ShadowtreeConfigInput {
  const timing = { ...input.timing };
  const timeline = { ...input.timeline };
  const reconcile = { ...input.reconcile };
  const push = { ...input.push };
  const log = { ...input.log };
  const server = { ...input.server };

  if (env.SHADOWTREE_TIMING !== undefined) {
    timing.enabled = parseFlag("SHADOWTREE_TIMING", env.SHADOWTREE_TIMING);
  }
  if (env.SHADOWTREE_MAX_EVENTS !== undefined) {
    timeline.maxEvents = parseNumber("SHADOWTREE_MAX_EVENTS", env.SHADOWTREE_MAX_EVENTS);
  }
  if (env.SHADOWTREE_RECONCILE_MS !== undefined) {
    reconcile.minIntervalMs = parseNumber("SHADOWTREE_RECONCILE_MS", env.SHADOWTREE_RECONCILE_MS);
  }
  if (env.SHADOWTREE_PUSH !== undefined) {
    push.enabled = parseFlag("SHADOWTREE_PUSH", env.SHADOWTREE_PUSH);
  }
  const level = env.SHADOWTREE_LOG_LEVEL;
  if (level !== undefined) {
    const match = LOG_LEVELS.find((candidate) => candidate === level);
    if (match === undefined) {
      throw new ConfigError([`SHADOWTREE_LOG_LEVEL: unknown level "${level}"`]);
    }
    log.level = match;
  }
  if (env.SHADOWTREE_PORT !== undefined) {
    server.port = parseNumber("SHADOWTREE_PORT", env.SHADOWTREE_PORT);
  }

  return { timing, timeline, reconcile, push, log, server };
}

/**
 * Validate configuration input, fill defaults and apply environment
 * overrides.
 *
 * @throws ConfigError when the input or an override is invalid
 *
 * @example
 * ```typescript
 * const config = loadConfig({ timeline: { maxEvents: 2000 } });
 * config.reconcile.minIntervalMs; // 250
 * ```
 */
export function loadConfig(
  input: ShadowtreeConfigInput = {},
  env: NodeJS.ProcessEnv = process.env,
): ShadowtreeConfig {
  const result = ShadowtreeConfigSchema.safeParse(applyEnv(input, env));
  if (!result.success) {
    throw new ConfigError(
      result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`),
    );
  }
  return result.data;
}
