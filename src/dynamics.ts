import { InputError } from "./errors.js";
import { parseExpr, substitute, symbols, type Expr } from "./expr.js";

export type PortMode = "event_send" | "event_receive" | "analog_send" | "analog_receive" | "analog_reduce";
export type Communication = "event" | "analog";

export type Port = {
  name: string;
  mode: PortMode;
  dimension?: string;
};

export type Alias = { name: string; rhs: Expr };
export type TimeDerivative = { variable: string; rhs: Expr };
export type StateAssignment = { variable: string; rhs: Expr };

export type OnEvent = {
  srcPort: string;
  stateAssignments: StateAssignment[];
  outputEvents: string[];
  targetRegime?: string;
};

export type OnCondition = {
  trigger: Expr;
  stateAssignments: StateAssignment[];
  outputEvents: string[];
  targetRegime?: string;
};

export type Regime = {
  name: string;
  timeDerivatives: TimeDerivative[];
  onEvents: OnEvent[];
  onConditions: OnCondition[];
};

/** Event wiring left inside a flattened multi-component. */
export type LocalEvent = { sendPort: string; receivePort: string };

export type Dynamics = {
  name: string;
  parameters: string[];
  stateVariables: string[];
  aliases: Alias[];
  ports: Port[];
  regimes: Regime[];
  localEvents?: LocalEvent[];
};

export type PropertyValue =
  | { kind: "single"; value: number }
  | { kind: "array"; values: number[] }
  | { kind: "random"; distribution: string; parameters: Record<string, number> };

export type Property = {
  name: string;
  value: PropertyValue;
  units?: string;
};

export type DynamicsProperties = {
  kind: "properties";
  name: string;
  definition: Dynamics;
  properties: Property[];
  initialValues: Property[];
};

// Text form used by readers and tests.
export type TransitionSpec = {
  state_assignments?: Record<string, string>;
  output_events?: string[];
  target?: string;
};

export type RegimeSpec = {
  name: string;
  time_derivatives?: Record<string, string>;
  on_events?: Array<TransitionSpec & { port: string }>;
  on_conditions?: Array<TransitionSpec & { trigger: string }>;
};

export type DynamicsSpec = {
  name: string;
  parameters?: string[];
  state_variables?: string[];
  aliases?: Record<string, string>;
  ports?: Port[];
  regimes?: RegimeSpec[];
};

export const EVENT_MODES: ReadonlySet<PortMode> = new Set<PortMode>(["event_send", "event_receive"]);
export const SEND_MODES: ReadonlySet<PortMode> = new Set<PortMode>(["event_send", "analog_send"]);

export function communicationOf(mode: PortMode): Communication {
  return EVENT_MODES.has(mode) ? "event" : "analog";
}

function assignments(src: Record<string, string> | undefined): StateAssignment[] {
  return Object.entries(src ?? {}).map(([variable, rhs]) => ({ variable, rhs: parseExpr(rhs) }));
}

export function defineDynamics(spec: DynamicsSpec): Dynamics {
  const d: Dynamics = {
    name: spec.name,
    parameters: [...(spec.parameters ?? [])],
    stateVariables: [...(spec.state_variables ?? [])],
    aliases: Object.entries(spec.aliases ?? {}).map(([name, rhs]) => ({ name, rhs: parseExpr(rhs) })),
    ports: (spec.ports ?? []).map((p) => ({ ...p })),
    regimes: (spec.regimes ?? []).map((r) => ({
      name: r.name,
      timeDerivatives: Object.entries(r.time_derivatives ?? {}).map(([variable, rhs]) => ({
        variable,
        rhs: parseExpr(rhs),
      })),
      onEvents: (r.on_events ?? []).map((t) => ({
        srcPort: t.port,
        stateAssignments: assignments(t.state_assignments),
        outputEvents: [...(t.output_events ?? [])],
        targetRegime: t.target,
      })),
      onConditions: (r.on_conditions ?? []).map((t) => ({
        trigger: parseExpr(t.trigger),
        stateAssignments: assignments(t.state_assignments),
        outputEvents: [...(t.output_events ?? [])],
        targetRegime: t.target,
      })),
    })),
  };
  if (d.regimes.length === 0) d.regimes.push({ name: "default", timeDerivatives: [], onEvents: [], onConditions: [] });
  validateDynamics(d);
  return d;
}

function validateDynamics(d: Dynamics): void {
  const fail = (msg: string): never => {
    throw new InputError(msg, `dynamics '${d.name}'`);
  };
  const declared = new Set<string>();
  const declare = (name: string, what: string): void => {
    if (declared.has(name)) fail(`${what} '${name}' is declared twice`);
    declared.add(name);
  };
  d.parameters.forEach((p) => declare(p, "parameter"));
  d.stateVariables.forEach((s) => declare(s, "state variable"));
  d.aliases.forEach((a) => declare(a.name, "alias"));
  const portNames = new Set<string>();
  for (const p of d.ports) {
    if (portNames.has(p.name)) fail(`port '${p.name}' is declared twice`);
    portNames.add(p.name);
    if (p.mode === "analog_receive" || p.mode === "analog_reduce") declare(p.name, "analog receive port");
    if (p.mode === "analog_send" && !declared.has(p.name)) {
      fail(`analog send port '${p.name}' matches no state variable or alias`);
    }
  }
  const regimeNames = new Set(d.regimes.map((r) => r.name));
  const states = new Set(d.stateVariables);
  for (const r of d.regimes) {
    for (const td of r.timeDerivatives) {
      if (!states.has(td.variable)) fail(`time derivative of undeclared state variable '${td.variable}'`);
    }
    for (const t of [...r.onEvents, ...r.onConditions]) {
      if (t.targetRegime !== undefined && !regimeNames.has(t.targetRegime)) {
        fail(`transition in regime '${r.name}' targets unknown regime '${t.targetRegime}'`);
      }
      for (const sa of t.stateAssignments) {
        if (!states.has(sa.variable)) fail(`assignment to undeclared state variable '${sa.variable}'`);
      }
      for (const ev of t.outputEvents) {
        if (findPort(d, ev)?.mode !== "event_send") fail(`output event on unknown event send port '${ev}'`);
      }
    }
    for (const oe of r.onEvents) {
      if (findPort(d, oe.srcPort)?.mode !== "event_receive") {
        fail(`on-event on unknown event receive port '${oe.srcPort}'`);
      }
    }
  }
}

export function findPort(d: Dynamics, name: string): Port | undefined {
  return d.ports.find((p) => p.name === name);
}

export function allTimeDerivatives(d: Dynamics): TimeDerivative[] {
  return d.regimes.flatMap((r) => r.timeDerivatives);
}

export function allOnEvents(d: Dynamics): OnEvent[] {
  return d.regimes.flatMap((r) => r.onEvents);
}

export function allOnConditions(d: Dynamics): OnCondition[] {
  return d.regimes.flatMap((r) => r.onConditions);
}

export type Required = {
  parameters: Set<string>;
  stateVariables: Set<string>;
  aliases: Set<string>;
  ports: Set<string>;
};

/** Everything the given expressions depend on, following aliases transitively. */
export function requiredFor(d: Dynamics, exprs: Iterable<Expr>): Required {
  const params = new Set(d.parameters);
  const states = new Set(d.stateVariables);
  const aliasByName = new Map(d.aliases.map((a) => [a.name, a]));
  const portNames = new Set(d.ports.map((p) => p.name));
  const out: Required = { parameters: new Set(), stateVariables: new Set(), aliases: new Set(), ports: new Set() };
  const pending: string[] = [];
  for (const e of exprs) pending.push(...symbols(e));
  while (pending.length > 0) {
    const s = pending.pop();
    if (s === undefined) break;
    if (params.has(s)) out.parameters.add(s);
    else if (states.has(s)) out.stateVariables.add(s);
    else if (aliasByName.has(s)) {
      const alias = aliasByName.get(s);
      if (alias && !out.aliases.has(s)) {
        out.aliases.add(s);
        pending.push(...symbols(alias.rhs));
      }
    } else if (portNames.has(s)) out.ports.add(s);
  }
  return out;
}

export function transitionExprs(t: OnEvent | OnCondition): Expr[] {
  const rhs = t.stateAssignments.map((sa) => sa.rhs);
  return "trigger" in t ? [t.trigger, ...rhs] : rhs;
}

/** Replace every alias reference in `e` by its definition. */
export function expandAliases(d: Dynamics, e: Expr): Expr {
  const resolved = new Map<string, Expr>();
  const visiting = new Set<string>();
  const byName = new Map(d.aliases.map((a) => [a.name, a]));
  const resolve = (name: string): Expr => {
    const done = resolved.get(name);
    if (done) return done;
    const alias = byName.get(name);
    if (!alias) throw new InputError(`unknown alias '${name}'`, `dynamics '${d.name}'`);
    if (visiting.has(name)) throw new InputError(`alias '${name}' is defined in terms of itself`, `dynamics '${d.name}'`);
    visiting.add(name);
    const out = expand(alias.rhs);
    visiting.delete(name);
    resolved.set(name, out);
    return out;
  };
  const expand = (x: Expr): Expr => {
    const map = new Map<string, Expr>();
    for (const s of symbols(x)) if (byName.has(s)) map.set(s, resolve(s));
    return map.size > 0 ? substitute(x, map) : x;
  };
  return expand(e);
}
