import {
  createComponentArray,
  invertConnectivity,
  NameRegistry,
  type ComponentArray,
  type ConnectionGroup,
  type Connectivity,
  type ExternalSynapse,
  type FlattenResult,
} from "./arrays.js";
import type { FlattenRules } from "./config.js";
import { NameCollisionError, ReservedNameError, StructuralError, type ErrorContext } from "./errors.js";
import { classifySynapse, type Classification } from "./linearity.js";
import {
  createMultiComponent,
  flattenMulti,
  multiProperties,
  type ExposureRef,
  type InternalConnection,
  type SubComponent,
} from "./multi.js";
import { RoleTable } from "./namespace.js";
import { members, portConnectionKey, touches, type Network, type Population, type PortConnection, type Projection } from "./network.js";
import { extractConnectionPropertySets, type ConnectionPropertySet } from "./property_extract.js";
import { DEFAULT_SYNAPSE_SUFFIX, flattenSynapse, type FlatSynapse } from "./synapse_flatten.js";
import { sortedBy } from "./util.js";

export type FlattenOptions = {
  /** Sub-component name of the cell dynamics inside each population's aggregate. */
  cellRole: string;
  synapseSuffix?: string;
};

export const DEFAULT_CELL_ROLE = "cell";

/**
 * Names must be unique across populations and projections and none may
 * take the cell role name; checked before anything is flattened.
 */
export function validateNetwork(net: Network, cellRole: string): void {
  const seen = new Map<string, string>();
  const claim = (name: string, what: string, ctx: ErrorContext): void => {
    if (name === cellRole) throw new ReservedNameError(cellRole, what, ctx);
    const prev = seen.get(name);
    if (prev !== undefined) throw new NameCollisionError(name, `${prev}/${what}`, ctx);
    seen.set(name, what);
  };
  for (const pop of net.populations) claim(pop.name, "population", { population: pop.name });
  for (const proj of net.projections) claim(proj.name, "projection", { projection: proj.name });
  const known = new Set(net.populations.map((p) => p.name));
  for (const proj of net.projections) {
    for (const ref of [proj.pre, proj.post]) {
      for (const m of members(ref)) {
        if (!known.has(m)) {
          throw new StructuralError(`refers to unknown population '${m}'`, { projection: proj.name });
        }
      }
    }
  }
}

function exposuresFor(pc: PortConnection, table: RoleTable): ExposureRef[] {
  const out: ExposureRef[] = [];
  const sender = table.get(pc.senderRole);
  const receiver = table.get(pc.receiverRole);
  if (sender !== undefined) out.push({ subComponent: sender, port: pc.sendPort });
  if (receiver !== undefined) out.push({ subComponent: receiver, port: pc.receivePort });
  return out;
}

function toInternal(pc: PortConnection, table: RoleTable, ctx: ErrorContext): InternalConnection {
  return {
    sender: table.require(pc.senderRole, ctx),
    receiver: table.require(pc.receiverRole, ctx),
    sendPort: pc.sendPort,
    receivePort: pc.receivePort,
    kind: pc.kind,
  };
}

function classify(
  proj: Projection,
  flat: FlatSynapse,
): { classification: Classification; sets: ConnectionPropertySet[] } {
  const classification = classifySynapse(flat.synapse);
  if (classification.kind === "unflattenable") return { classification, sets: [] };
  const extraction = extractConnectionPropertySets(
    classification.dynamics,
    multiProperties(flat.synapse).properties,
    proj.name,
  );
  if (extraction.kind === "conflict") {
    return { classification: { kind: "unflattenable", reason: extraction.reason }, sets: [] };
  }
  return { classification, sets: extraction.sets };
}

type Context = {
  net: Network;
  cellRole: string;
  populations: Map<string, Population>;
  synapses: Map<string, FlatSynapse>;
  groups: NameRegistry<ConnectionGroup>;
};

function synapseOf(c: Context, proj: Projection): FlatSynapse {
  const flat = c.synapses.get(proj.name);
  if (!flat) throw new StructuralError("projection was not flattened", { projection: proj.name });
  return flat;
}

function emitGroups(c: Context, pop: Population, proj: Projection, preConns: PortConnection[]): void {
  const src = new RoleTable({ pre: c.cellRole });
  const dst = new RoleTable({ post: c.cellRole, synapse: proj.name });
  const named = proj.pre.kind === "selection" || proj.post.kind === "selection";
  const distinct = new Map(preConns.map((pc) => [portConnectionKey(pc), pc]));
  for (const sourcePop of members(proj.pre)) {
    const pre = c.populations.get(sourcePop);
    if (!pre) throw new StructuralError(`refers to unknown population '${sourcePop}'`, { projection: proj.name });
    const forward: Connectivity = {
      rule: proj.connectivity,
      sourceSize: pre.size,
      destinationSize: pop.size,
      inverted: false,
    };
    for (const pc of distinct.values()) {
      const ctx = { population: pop.name, projection: proj.name };
      if (pc.senderRole === "pre" && pc.receiverRole === "pre") {
        throw new StructuralError(`port connection ${pc.sendPort} -> ${pc.receivePort} loops on the pre role`, ctx);
      }
      const base = [proj.name, pc.senderRole, pc.sendPort, pc.receiverRole, pc.receivePort];
      const name = (named ? [...base, sourcePop, pop.name] : base).join("__");
      const group: ConnectionGroup =
        pc.senderRole === "pre"
          ? {
              name,
              kind: pc.kind,
              source: sourcePop,
              destination: pop.name,
              sourcePort: src.namespace(pc.sendPort, "pre", ctx),
              destinationPort: dst.namespace(pc.receivePort, pc.receiverRole, ctx),
              connectivity: forward,
              delay: proj.delay,
            }
          : {
              // signals back to the source carry no delay
              name,
              kind: pc.kind,
              source: pop.name,
              destination: sourcePop,
              sourcePort: dst.namespace(pc.sendPort, pc.senderRole, ctx),
              destinationPort: src.namespace(pc.receivePort, "pre", ctx),
              connectivity: invertConnectivity(forward),
              delay: { value: 0, units: proj.delay.units },
            };
      c.groups.insert(name, group, ctx);
    }
  }
}

function flattenPopulation(c: Context, pop: Population): ComponentArray {
  const receiving = sortedBy(
    c.net.projections.filter((p) => members(p.post).includes(pop.name)),
    (p) => p.name,
  );
  const sending = sortedBy(
    c.net.projections.filter((p) => members(p.pre).includes(pop.name)),
    (p) => p.name,
  );
  const subs: Array<[string, SubComponent]> = [[c.cellRole, pop.cell]];
  const internal: InternalConnection[] = [];
  const exposures: ExposureRef[] = [];
  const synapses: ExternalSynapse[] = [];
  const propertySets: ConnectionPropertySet[] = [];
  const cellOnly = new RoleTable({ post: c.cellRole });

  for (const proj of receiving) {
    const ctx = { population: pop.name, projection: proj.name };
    const flat = synapseOf(c, proj);
    const preConns = flat.portConnections.filter((pc) => touches(pc, "pre"));
    const postConns = flat.portConnections.filter((pc) => !touches(pc, "pre"));
    const { classification, sets } = classify(proj, flat);
    let table = cellOnly;
    if (classification.kind === "embeddable") {
      table = new RoleTable({ post: c.cellRole, synapse: proj.name });
      subs.push([proj.name, flat.synapse]);
      propertySets.push(...sets);
      internal.push(...postConns.map((pc) => toInternal(pc, table, ctx)));
    } else {
      synapses.push({
        name: proj.name,
        dynamics: flat.synapse,
        portConnections: postConns,
        reason: classification.reason,
      });
      exposures.push(...postConns.flatMap((pc) => exposuresFor(pc, cellOnly)));
    }
    exposures.push(...preConns.flatMap((pc) => exposuresFor(pc, table)));
    emitGroups(c, pop, proj, preConns);
  }

  const preOnly = new RoleTable({ pre: c.cellRole });
  for (const proj of sending) {
    const { portConnections } = synapseOf(c, proj);
    exposures.push(...portConnections.filter((pc) => touches(pc, "pre")).flatMap((pc) => exposuresFor(pc, preOnly)));
  }

  const ctx = { population: pop.name };
  const dynamics = createMultiComponent(
    { name: pop.name, subComponents: subs, portConnections: internal, portExposures: exposures },
    ctx,
  );
  return createComponentArray({
    name: pop.name,
    size: pop.size,
    dynamics,
    flattened: flattenMulti(dynamics, ctx),
    synapses,
    connectionPropertySets: propertySets,
  });
}

/**
 * Lowers every population of `net` into a component array and every
 * pre-side port connection of every projection into a connection group.
 */
export function flattenNetwork(net: Network, opts: FlattenOptions = { cellRole: DEFAULT_CELL_ROLE }): FlattenResult {
  validateNetwork(net, opts.cellRole);
  const suffix = opts.synapseSuffix ?? DEFAULT_SYNAPSE_SUFFIX;
  const c: Context = {
    net,
    cellRole: opts.cellRole,
    populations: new Map(net.populations.map((p) => [p.name, p])),
    synapses: new Map(net.projections.map((p) => [p.name, flattenSynapse(p, suffix)])),
    groups: new NameRegistry<ConnectionGroup>("connection group"),
  };
  const arrays = new NameRegistry<ComponentArray>("component array");
  for (const pop of net.populations) {
    arrays.insert(pop.name, flattenPopulation(c, pop), { population: pop.name });
  }
  return { componentArrays: arrays.toMap(), connectionGroups: c.groups.toMap() };
}

export function flattenWithRules(net: Network, rules: FlattenRules): FlattenResult {
  return flattenNetwork(net, { cellRole: rules.cell_role, synapseSuffix: rules.synapse_suffix });
}
