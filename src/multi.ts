import { NamespaceCollisionError, StructuralError, UnknownPortError, type ErrorContext } from "./errors.js";
import {
  communicationOf,
  SEND_MODES,
  type Communication,
  type Dynamics,
  type DynamicsProperties,
  type LocalEvent,
  type OnCondition,
  type OnEvent,
  type Port,
  type PortMode,
  type Property,
  type Regime,
  type StateAssignment,
} from "./dynamics.js";
import { renameSymbols, substitute, sym, type Expr } from "./expr.js";
import { appendNamespace, NS_SEPARATOR } from "./namespace.js";
import { sortedBy } from "./util.js";

export type SubComponent = DynamicsProperties | MultiComponent;

export type InternalConnection = {
  sender: string;
  receiver: string;
  sendPort: string;
  receivePort: string;
  kind: Communication;
};

export type PortExposure = {
  name: string;
  subComponent: string;
  port: string;
  mode: PortMode;
};

export type MultiComponent = {
  kind: "multi";
  name: string;
  subComponents: Record<string, SubComponent>;
  portConnections: InternalConnection[];
  portExposures: PortExposure[];
};

export type ExposureRef = { subComponent: string; port: string };

export type MultiComponentInit = {
  name: string;
  subComponents: Array<[string, SubComponent]>;
  portConnections?: Iterable<InternalConnection>;
  portExposures?: Iterable<ExposureRef>;
};

export function portsOf(c: SubComponent): Port[] {
  if (c.kind === "properties") return c.definition.ports;
  return c.portExposures.map((e) => ({ name: e.name, mode: e.mode }));
}

export function findSubPort(c: SubComponent, port: string): Port | undefined {
  return portsOf(c).find((p) => p.name === port);
}

function connectionKey(c: InternalConnection): string {
  return [c.sender, c.sendPort, c.receiver, c.receivePort].join("\u0000");
}

/**
 * Builds a MultiComponent, checking every sub-component name is unique and
 * splittable, every connection joins a send port to a receive port of the
 * same kind, and every exposure points at an existing sub-component port.
 * Exposures are named `<port>__<sub-component>`. Connections and exposures
 * are deduplicated and put in canonical order.
 */
export function createMultiComponent(init: MultiComponentInit, ctx: ErrorContext = {}): MultiComponent {
  const subs: Record<string, SubComponent> = {};
  for (const [name, comp] of sortedBy(init.subComponents, ([n]) => n)) {
    if (name in subs) throw new NamespaceCollisionError(name, `sub-component of '${init.name}' declared twice`, ctx);
    if (name.length === 0 || name.includes(NS_SEPARATOR)) {
      throw new NamespaceCollisionError(name, `sub-component names may not contain '${NS_SEPARATOR}'`, ctx);
    }
    subs[name] = comp;
  }
  const lookup = (subName: string, port: string): Port => {
    const sub = subs[subName];
    if (!sub) throw new StructuralError(`'${init.name}' has no sub-component '${subName}'`, ctx);
    const p = findSubPort(sub, port);
    if (!p) throw new UnknownPortError(port, subName, ctx);
    return p;
  };

  const conns = new Map<string, InternalConnection>();
  for (const c of init.portConnections ?? []) {
    const send = lookup(c.sender, c.sendPort);
    const recv = lookup(c.receiver, c.receivePort);
    if (!SEND_MODES.has(send.mode) || SEND_MODES.has(recv.mode)) {
      throw new StructuralError(
        `connection ${c.sender}.${c.sendPort} -> ${c.receiver}.${c.receivePort} must run from a send port to a receive port`,
        ctx,
      );
    }
    if (communicationOf(send.mode) !== c.kind || communicationOf(recv.mode) !== c.kind) {
      throw new StructuralError(
        `connection ${c.sender}.${c.sendPort} -> ${c.receiver}.${c.receivePort} is declared ${c.kind} but joins ${send.mode} to ${recv.mode}`,
        ctx,
      );
    }
    conns.set(connectionKey(c), { ...c });
  }

  const exposures = new Map<string, PortExposure>();
  for (const e of init.portExposures ?? []) {
    const p = lookup(e.subComponent, e.port);
    const name = appendNamespace(e.port, e.subComponent);
    const prev = exposures.get(name);
    if (prev && (prev.subComponent !== e.subComponent || prev.port !== e.port)) {
      throw new NamespaceCollisionError(
        name,
        `exposed for both ${prev.subComponent}.${prev.port} and ${e.subComponent}.${e.port}`,
        ctx,
      );
    }
    exposures.set(name, { name, subComponent: e.subComponent, port: e.port, mode: p.mode });
  }

  return {
    kind: "multi",
    name: init.name,
    subComponents: subs,
    portConnections: sortedBy(conns.values(), connectionKey),
    portExposures: sortedBy(exposures.values(), (e) => e.name),
  };
}

export function dynamicsOf(c: SubComponent): Dynamics {
  return c.kind === "properties" ? c.definition : flattenMulti(c);
}

function namespaceDynamics(d: Dynamics, ns: string): Dynamics {
  const declared = new Set<string>([
    ...d.parameters,
    ...d.stateVariables,
    ...d.aliases.map((a) => a.name),
    ...d.ports.map((p) => p.name),
    ...(d.localEvents ?? []).flatMap((l) => [l.sendPort, l.receivePort]),
  ]);
  const n = (name: string): string => (declared.has(name) ? appendNamespace(name, ns) : name);
  const rn = (e: Expr): Expr => renameSymbols(e, n);
  const assigns = (list: StateAssignment[]): StateAssignment[] =>
    list.map((sa) => ({ variable: n(sa.variable), rhs: rn(sa.rhs) }));
  return {
    name: appendNamespace(d.name, ns),
    parameters: d.parameters.map(n),
    stateVariables: d.stateVariables.map(n),
    aliases: d.aliases.map((a) => ({ name: n(a.name), rhs: rn(a.rhs) })),
    ports: d.ports.map((p) => ({ ...p, name: n(p.name) })),
    regimes: d.regimes.map((r) => ({
      name: r.name,
      timeDerivatives: r.timeDerivatives.map((td) => ({ variable: n(td.variable), rhs: rn(td.rhs) })),
      onEvents: r.onEvents.map((t) => ({
        ...t,
        srcPort: n(t.srcPort),
        stateAssignments: assigns(t.stateAssignments),
        outputEvents: t.outputEvents.map(n),
      })),
      onConditions: r.onConditions.map((t) => ({
        ...t,
        trigger: rn(t.trigger),
        stateAssignments: assigns(t.stateAssignments),
        outputEvents: t.outputEvents.map(n),
      })),
    })),
    localEvents: (d.localEvents ?? []).map((l) => ({ sendPort: n(l.sendPort), receivePort: n(l.receivePort) })),
  };
}

const REGIME_JOIN = "___";

function regimeProduct(parts: Regime[][]): Regime[] {
  let combos: Regime[][] = [[]];
  for (const regimes of parts) {
    combos = combos.flatMap((c) => regimes.map((r) => [...c, r]));
  }
  const nameOf = (names: string[]): string => names.join(REGIME_JOIN);
  return combos.map((combo) => {
    const names = combo.map((r) => r.name);
    // a transition only moves the regime of the sub-component it belongs to
    const retarget = <T extends OnEvent | OnCondition>(i: number, t: T): T => {
      if (t.targetRegime === undefined) return t;
      const target = t.targetRegime;
      return { ...t, targetRegime: nameOf(names.map((n, j) => (j === i ? target : n))) };
    };
    return {
      name: nameOf(names),
      timeDerivatives: combo.flatMap((r) => r.timeDerivatives),
      onEvents: combo.flatMap((r, i) => r.onEvents.map((t) => retarget(i, t))),
      onConditions: combo.flatMap((r, i) => r.onConditions.map((t) => retarget(i, t))),
    };
  });
}

/**
 * Single Dynamics equivalent to a MultiComponent. Sub-component symbols are
 * namespaced by sub-component name, internally connected analog inputs are
 * replaced by their senders, and only exposed ports remain ports.
 */
export function flattenMulti(multi: MultiComponent, ctx: ErrorContext = {}): Dynamics {
  const parts = Object.entries(multi.subComponents).map(([ns, c]) => ({ ns, d: namespaceDynamics(dynamicsOf(c), ns) }));

  const owner = new Map<string, string>();
  for (const { ns, d } of parts) {
    const names = [...d.parameters, ...d.stateVariables, ...d.aliases.map((a) => a.name)];
    for (const p of d.ports) if (!names.includes(p.name)) names.push(p.name);
    for (const name of names) {
      const prev = owner.get(name);
      if (prev !== undefined) {
        throw new NamespaceCollisionError(name, `declared by both '${prev}' and '${ns}' in '${multi.name}'`, ctx);
      }
      owner.set(name, ns);
    }
  }

  const exposed = new Set(multi.portExposures.map((e) => e.name));
  const analogIn = new Map<string, Expr[]>();
  const localEvents: LocalEvent[] = parts.flatMap((p) => p.d.localEvents ?? []);
  for (const c of multi.portConnections) {
    const send = appendNamespace(c.sendPort, c.sender);
    const recv = appendNamespace(c.receivePort, c.receiver);
    if (c.kind === "event") {
      localEvents.push({ sendPort: send, receivePort: recv });
      continue;
    }
    const list = analogIn.get(recv) ?? [];
    list.push(sym(send));
    analogIn.set(recv, list);
  }
  const replace = new Map<string, Expr>();
  for (const [recv, senders] of analogIn) {
    const all = exposed.has(recv) ? [sym(recv), ...senders] : senders;
    replace.set(
      recv,
      all.reduce((acc, e) => ({ kind: "binary", op: "+", left: acc, right: e })),
    );
  }
  const sub = (e: Expr): Expr => (replace.size > 0 ? substitute(e, replace) : e);
  const assigns = (list: StateAssignment[]): StateAssignment[] => list.map((sa) => ({ ...sa, rhs: sub(sa.rhs) }));

  // exposure names coincide with the namespaced port names
  const ports: Port[] = multi.portExposures.map((e) => ({ name: e.name, mode: e.mode }));

  const regimes = regimeProduct(parts.map(({ d }) => d.regimes)).map((r) => ({
    ...r,
    timeDerivatives: r.timeDerivatives.map((td) => ({ ...td, rhs: sub(td.rhs) })),
    onEvents: r.onEvents.map((t) => ({ ...t, stateAssignments: assigns(t.stateAssignments) })),
    onConditions: r.onConditions.map((t) => ({ ...t, trigger: sub(t.trigger), stateAssignments: assigns(t.stateAssignments) })),
  }));

  return {
    name: multi.name,
    parameters: parts.flatMap((p) => p.d.parameters),
    stateVariables: parts.flatMap((p) => p.d.stateVariables),
    aliases: parts.flatMap((p) => p.d.aliases.map((a) => ({ ...a, rhs: sub(a.rhs) }))),
    ports: sortedBy(ports, (p) => p.name),
    regimes,
    localEvents: sortedBy(localEvents, (l) => `${l.sendPort}\u0000${l.receivePort}`),
  };
}

function namespaceProperties(props: Property[], ns: string): Property[] {
  return props.map((p) => ({ ...p, name: appendNamespace(p.name, ns) }));
}

export type FlatProperties = { properties: Property[]; initialValues: Property[] };

/** Namespaced properties and initial values of every (nested) sub-component. */
export function multiProperties(c: SubComponent): FlatProperties {
  if (c.kind === "properties") return { properties: c.properties, initialValues: c.initialValues };
  const out: FlatProperties = { properties: [], initialValues: [] };
  for (const [ns, sub] of Object.entries(c.subComponents)) {
    const inner = multiProperties(sub);
    out.properties.push(...namespaceProperties(inner.properties, ns));
    out.initialValues.push(...namespaceProperties(inner.initialValues, ns));
  }
  return out;
}
