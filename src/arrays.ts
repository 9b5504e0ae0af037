import { NameCollisionError, type ErrorContext } from "./errors.js";
import type { Communication, Dynamics, Property } from "./dynamics.js";
import type { MultiComponent, SubComponent } from "./multi.js";
import type { ConnectivityRule, PortConnection, Scalar } from "./network.js";
import type { ConnectionPropertySet } from "./property_extract.js";
import { appendNamespace } from "./namespace.js";
import { byName, sortedBy } from "./util.js";

/** A synapse that must be instantiated once per connection. */
export type ExternalSynapse = {
  name: string;
  dynamics: MultiComponent;
  portConnections: PortConnection[];
  // why it could not be embedded in the target cell
  reason: string;
};

export type ComponentArray = {
  name: string;
  size: number;
  dynamics: MultiComponent;
  // `dynamics` as one namespaced Dynamics, the form a backend instantiates
  flattened: Dynamics;
  synapses: ExternalSynapse[];
  connectionPropertySets: ConnectionPropertySet[];
};

export type Connectivity = {
  rule: ConnectivityRule;
  sourceSize: number;
  destinationSize: number;
  // sender and receiver sets of the rule are swapped
  inverted: boolean;
};

export type ConnectionGroup = {
  name: string;
  kind: Communication;
  source: string;
  destination: string;
  sourcePort: string;
  destinationPort: string;
  connectivity: Connectivity;
  delay: Scalar;
};

export type FlattenResult = {
  componentArrays: ReadonlyMap<string, ComponentArray>;
  connectionGroups: ReadonlyMap<string, ConnectionGroup>;
};

export function invertConnectivity(c: Connectivity): Connectivity {
  return {
    rule: c.rule,
    sourceSize: c.destinationSize,
    destinationSize: c.sourceSize,
    inverted: !c.inverted,
  };
}

export function createComponentArray(init: ComponentArray): ComponentArray {
  return {
    ...init,
    synapses: [...init.synapses].sort(byName),
    connectionPropertySets: sortedBy(init.connectionPropertySets, (s) => s.port),
  };
}

/** Name-keyed accumulator that refuses to overwrite. */
export class NameRegistry<T> {
  private readonly items = new Map<string, T>();

  constructor(private readonly kind: string) {}

  insert(name: string, item: T, ctx: ErrorContext = {}): void {
    if (this.items.has(name)) throw new NameCollisionError(name, this.kind, ctx);
    this.items.set(name, item);
  }

  get size(): number {
    return this.items.size;
  }

  toMap(): ReadonlyMap<string, T> {
    return new Map(this.items);
  }
}

export type SynapseLookup =
  | { kind: "embedded"; synapse: MultiComponent; connectionPropertySets: ConnectionPropertySet[] }
  | { kind: "external"; synapse: ExternalSynapse };

/** How the synapse of `projection` ended up in `array`, if it targets it. */
export function lookupSynapse(array: ComponentArray, projection: string): SynapseLookup | undefined {
  const external = array.synapses.find((s) => s.name === projection);
  if (external) return { kind: "external", synapse: external };
  const sub = array.dynamics.subComponents[projection];
  if (!sub || sub.kind !== "multi") return undefined;
  const prefix = appendNamespace("", projection);
  return {
    kind: "embedded",
    synapse: sub,
    connectionPropertySets: array.connectionPropertySets.filter((s) => s.port.endsWith(prefix)),
  };
}

export type ComponentSummary = {
  definition?: string;
  properties?: Record<string, string>;
  subComponents?: Record<string, ComponentSummary>;
  connections?: string[];
  exposures?: string[];
};

function describeValue(p: Property): string {
  const units = p.units ? ` ${p.units}` : "";
  switch (p.value.kind) {
    case "single":
      return `${p.value.value}${units}`;
    case "array":
      return `[${p.value.values.length} values]${units}`;
    case "random":
      return `${p.value.distribution}(${Object.entries(p.value.parameters)
        .map(([k, v]) => `${k}=${v}`)
        .join(", ")})${units}`;
  }
}

export function describeComponent(c: SubComponent): ComponentSummary {
  if (c.kind === "properties") {
    return {
      definition: c.definition.name,
      properties: Object.fromEntries(c.properties.map((p) => [p.name, describeValue(p)])),
    };
  }
  return {
    subComponents: Object.fromEntries(Object.entries(c.subComponents).map(([n, s]) => [n, describeComponent(s)])),
    connections: c.portConnections.map((pc) => `${pc.sender}.${pc.sendPort} -> ${pc.receiver}.${pc.receivePort} (${pc.kind})`),
    exposures: c.portExposures.map((e) => `${e.name} = ${e.subComponent}.${e.port} (${e.mode})`),
  };
}

/** JSON-ready view of a flattening result for the backend or for inspection. */
export function summarize(result: FlattenResult): Record<string, unknown> {
  const arrays: Record<string, unknown> = {};
  for (const [name, a] of result.componentArrays) {
    arrays[name] = {
      size: a.size,
      dynamics: describeComponent(a.dynamics),
      synapses: a.synapses.map((s) => ({
        name: s.name,
        reason: s.reason,
        dynamics: describeComponent(s.dynamics),
        portConnections: s.portConnections.map(
          (pc) => `${pc.senderRole}.${pc.sendPort} -> ${pc.receiverRole}.${pc.receivePort} (${pc.kind})`,
        ),
      })),
      connectionPropertySets: a.connectionPropertySets.map((s) => ({
        port: s.port,
        properties: Object.fromEntries(s.properties.map((p) => [p.name, describeValue(p)])),
      })),
    };
  }
  const groups: Record<string, unknown> = {};
  for (const [name, g] of result.connectionGroups) {
    groups[name] = {
      kind: g.kind,
      source: g.source,
      destination: g.destination,
      sourcePort: g.sourcePort,
      destinationPort: g.destinationPort,
      connectivity: {
        rule: g.connectivity.rule.definition,
        properties: Object.fromEntries(g.connectivity.rule.properties.map((p) => [p.name, describeValue(p)])),
        sourceSize: g.connectivity.sourceSize,
        destinationSize: g.connectivity.destinationSize,
        inverted: g.connectivity.inverted,
      },
      delay: `${g.delay.value} ${g.delay.units}`,
    };
  }
  return { componentArrays: arrays, connectionGroups: groups };
}
