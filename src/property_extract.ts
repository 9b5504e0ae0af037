import {
  allOnConditions,
  allOnEvents,
  allTimeDerivatives,
  requiredFor,
  transitionExprs,
  type Dynamics,
  type Property,
} from "./dynamics.js";
import { sym } from "./expr.js";
import { appendNamespace } from "./namespace.js";
import { byName, sortedBy } from "./util.js";

export type ConnectionPropertySet = {
  port: string;
  properties: Property[];
};

export type Extraction =
  | { kind: "extracted"; sets: ConnectionPropertySet[] }
  | { kind: "conflict"; reason: string; properties: string[] };

/** Properties that are not bound to one constant value across connections. */
export function varyingProperties(d: Dynamics, props: Property[]): Map<string, Property> {
  const params = new Set(d.parameters);
  return new Map(props.filter((p) => p.value.kind !== "single" && params.has(p.name)).map((p) => [p.name, p]));
}

/**
 * Parameters that time derivatives, on-conditions and analog outputs depend
 * on, directly or through aliases.
 */
export function continuousParameters(d: Dynamics): Set<string> {
  return requiredFor(d, [
    ...allTimeDerivatives(d).map((td) => td.rhs),
    ...allOnConditions(d).flatMap(transitionExprs),
    ...d.ports.filter((p) => p.mode === "analog_send").map((p) => sym(p.name)),
  ]).parameters;
}

/**
 * Groups the varying properties an embeddable synapse only uses inside
 * on-events by the port that triggers them, namespaced under `namespace`.
 * Any varying property that continuous dynamics depend on is a conflict.
 */
export function extractConnectionPropertySets(d: Dynamics, props: Property[], namespace: string): Extraction {
  const varying = varyingProperties(d, props);
  const forbidden = continuousParameters(d);
  const clash = [...varying.keys()].filter((name) => forbidden.has(name)).sort();
  if (clash.length > 0) {
    return {
      kind: "conflict",
      properties: clash,
      reason: `'${d.name}' varies ${clash.map((c) => `'${c}'`).join(", ")} per connection but its continuous dynamics depend on it`,
    };
  }

  const byPort = new Map<string, Set<string>>();
  for (const oe of allOnEvents(d)) {
    const used = requiredFor(d, transitionExprs(oe)).parameters;
    const set = byPort.get(oe.srcPort) ?? new Set<string>();
    for (const name of used) if (varying.has(name)) set.add(name);
    byPort.set(oe.srcPort, set);
  }

  const sets: ConnectionPropertySet[] = [];
  for (const [port, names] of byPort) {
    if (names.size === 0) continue;
    const properties: Property[] = [];
    for (const name of names) {
      const p = varying.get(name);
      if (p) properties.push({ ...p, name: appendNamespace(p.name, namespace) });
    }
    sets.push({ port: appendNamespace(port, namespace), properties: properties.sort(byName) });
  }
  return { kind: "extracted", sets: sortedBy(sets, (s) => s.port) };
}
