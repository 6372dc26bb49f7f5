/**
 * Reflective Introspector
 *
 * Reads the component tree out of a host renderer object that keeps its
 * component states in a `Map<number, state>`. The first call searches the
 * host for the map and for the state fields holding the component, its id
 * and its parent state. A failed search makes the introspector permanently
 * unsupported.
 *
 * @example
 * ```typescript
 * const introspector = createReflectiveIntrospector(renderer);
 * const registry = new ComponentRegistry({ introspector });
 * ```
 *
 * @module @shadowtree/core/host/reflective-introspector
 */

import { Logger } from "@shadowtree/kernel";
import type { ComponentTypeInfo } from "@shadowtree/shared";
import type {
  HostTreeEntry,
  HostTreeIntrospector,
  IntrospectionResult,
} from "./introspector.js";

const log = Logger.for("ReflectiveIntrospector");

export const DEFAULT_STATE_MAP_FIELDS = [
  "_componentStateById",
  "_componentStateByComponentId",
  "_componentStates",
  "_components",
] as const;

export interface ReflectiveIntrospectorOptions {
  /** Candidate property names holding the state map, tried in order */
  stateMapFields?: readonly string[];
  /** State property holding the component instance (default: "component") */
  componentField?: string;
  /** State property holding the numeric id (default: "componentId") */
  idField?: string;
  /** State property holding the parent state (default: "parentComponentState") */
  parentField?: string;
  /** Type descriptor for an instance (default: its constructor name) */
  typeInfoOf?: (instance: object) => ComponentTypeInfo;
}

interface ResolvedOptions {
  stateMapFields: readonly string[];
  componentField: string;
  idField: string;
  parentField: string;
  typeInfoOf: (instance: object) => ComponentTypeInfo;
}

type Discovery =
  | { status: "pending" }
  | { status: "found"; field: string; shapeVerified: boolean }
  | { status: "unsupported"; reason: string };

function isObject(value: unknown): value is object {
  return (typeof value === "object" || typeof value === "function") && value !== null;
}

function read(target: object, field: string): unknown {
  return Reflect.get(target, field);
}

export function constructorTypeInfo(instance: object): ComponentTypeInfo {
  const ctor: unknown = read(instance, "constructor");
  const name = typeof ctor === "function" && ctor.name ? ctor.name : "Anonymous";
  return { name, fullName: name };
}

function hasNumericKeys(map: Map<unknown, unknown>): boolean {
  for (const key of map.keys()) {
    return typeof key === "number";
  }
  return false;
}

export function createReflectiveIntrospector(
  host: object,
  options: ReflectiveIntrospectorOptions = {},
): HostTreeIntrospector {
  const resolved: ResolvedOptions = {
    stateMapFields: options.stateMapFields ?? DEFAULT_STATE_MAP_FIELDS,
    componentField: options.componentField ?? "component",
    idField: options.idField ?? "componentId",
    parentField: options.parentField ?? "parentComponentState",
    typeInfoOf: options.typeInfoOf ?? constructorTypeInfo,
  };
  let discovery: Discovery = { status: "pending" };

  function findStateMapField(): string | null {
    for (const field of resolved.stateMapFields) {
      if (read(host, field) instanceof Map) return field;
    }
    for (const field of Reflect.ownKeys(host)) {
      if (typeof field !== "string") continue;
      const value = read(host, field);
      if (value instanceof Map && hasNumericKeys(value)) return field;
    }
    return null;
  }

  function stateShapeMissing(state: unknown): string | null {
    if (!isObject(state)) return "component state is not an object";
    for (const field of [resolved.componentField, resolved.idField, resolved.parentField]) {
      if (!(field in state)) return `component state has no "${field}" field`;
    }
    return null;
  }

  function unsupported(reason: string): IntrospectionResult {
    discovery = { status: "unsupported", reason };
    log.info({ reason }, "Host tree introspection unsupported");
    return { supported: false, reason };
  }

  return {
    introspect(): IntrospectionResult {
      if (discovery.status === "unsupported") {
        return { supported: false, reason: discovery.reason };
      }
      if (discovery.status === "pending") {
        const field = findStateMapField();
        if (field === null) return unsupported("No component state map found on host");
        discovery = { status: "found", field, shapeVerified: false };
        log.debug({ field }, "Located component state map");
      }

      const states = read(host, discovery.field);
      if (!(states instanceof Map)) {
        return unsupported(`Host field "${discovery.field}" is no longer a Map`);
      }

      const stateMap: ReadonlyMap<unknown, unknown> = states;
      const snapshot = new Map<number, HostTreeEntry>();
      for (const [key, state] of stateMap) {
        if (!discovery.shapeVerified) {
          const missing = stateShapeMissing(state);
          if (missing !== null) return unsupported(missing);
          discovery = { ...discovery, shapeVerified: true };
        }
        if (!isObject(state)) continue;

        const rawId = read(state, resolved.idField);
        const componentId = typeof rawId === "number" ? rawId : typeof key === "number" ? key : null;
        if (componentId === null) continue;

        const component = read(state, resolved.componentField);
        const instance = isObject(component) ? component : null;

        const parentState = read(state, resolved.parentField);
        const rawParentId = isObject(parentState) ? read(parentState, resolved.idField) : null;
        const parentId = typeof rawParentId === "number" ? rawParentId : null;

        snapshot.set(componentId, {
          componentId,
          instance,
          parentId,
          typeInfo: instance ? resolved.typeInfoOf(instance) : { name: "Unknown", fullName: "Unknown" },
        });
      }
      return { supported: true, snapshot };
    },
  };
}
