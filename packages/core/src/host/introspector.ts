/**
 * Host Tree Introspection
 *
 * The host runtime owns the authoritative component tree. An introspector
 * reads it as a snapshot of `id -> (instance, parentId, type)`, or reports
 * that the host's internals are out of reach. `unsupported` is a normal,
 * possibly permanent, answer and not an error.
 *
 * @module @shadowtree/core/host
 */

import type { ComponentTypeInfo } from "@shadowtree/shared";
import type { ModuleLogger } from "@shadowtree/kernel";

export interface HostTreeEntry {
  componentId: number;
  /** Live instance, or null when the host exposes only the type */
  instance: object | null;
  parentId: number | null;
  typeInfo: ComponentTypeInfo;
}

/** Read once per reconciliation pass and not retained. */
export type HostTreeSnapshot = ReadonlyMap<number, HostTreeEntry>;

export type IntrospectionResult =
  | { supported: true; snapshot: HostTreeSnapshot }
  | { supported: false; reason: string };

export interface HostTreeIntrospector {
  introspect(): IntrospectionResult;
}

/**
 * Introspector for hosts that expose nothing. Registries built without one
 * serve directly resolved components only.
 */
export function createUnsupportedIntrospector(
  reason = "Host tree introspection is not available",
): HostTreeIntrospector {
  return {
    introspect: () => ({ supported: false, reason }),
  };
}

/**
 * Introspector over a fixed list of entries, for embedding hosts that can
 * hand the tree over directly.
 */
export function createStaticIntrospector(
  read: () => Iterable<HostTreeEntry>,
): HostTreeIntrospector {
  return {
    introspect() {
      const snapshot = new Map<number, HostTreeEntry>();
      for (const entry of read()) {
        snapshot.set(entry.componentId, entry);
      }
      return { supported: true, snapshot };
    },
  };
}

/**
 * Run an introspector, turning a throw into `unsupported`.
 */
export function safeIntrospect(
  introspector: HostTreeIntrospector,
  log: ModuleLogger,
): IntrospectionResult {
  try {
    return introspector.introspect();
  } catch (error) {
    log.debug({ err: error }, "Host tree introspection failed");
    return {
      supported: false,
      reason: error instanceof Error ? error.message : String(error),
    };
  }
}
