import path from "path";
import yaml from "js-yaml";
import {
  defineDynamics,
  type Communication,
  type Dynamics,
  type DynamicsProperties,
  type DynamicsSpec,
  type Port,
  type PortMode,
  type Property,
  type PropertyValue,
  type RegimeSpec,
} from "./dynamics.js";
import { InputError } from "./errors.js";
import { parseRole } from "./namespace.js";
import type { ConnectivityRule, Network, Population, PopulationRef, PortConnection, Projection, Scalar } from "./network.js";
import { parseNineml } from "./nineml_parse.js";
import { asArray, asNum, asStr, isRecord, readText } from "./util.js";

type Raw = Record<string, unknown>;

const PORT_MODES: readonly PortMode[] = ["event_send", "event_receive", "analog_send", "analog_receive", "analog_reduce"];
const COMMUNICATIONS: readonly Communication[] = ["event", "analog"];
const DEFAULT_DELAY_UNITS = "ms";

function record(v: unknown, where: string): Raw {
  if (!isRecord(v)) throw new InputError("expected a mapping", where);
  return v;
}

function reqStr(o: Raw, key: string, where: string): string {
  const v = asStr(o[key]);
  if (v === undefined || v.length === 0) throw new InputError(`missing '${key}'`, where);
  return v;
}

function names(v: unknown, where: string): string[] {
  return asArray(v).map((item) => {
    const s = isRecord(item) ? asStr(item.name) : asStr(item);
    if (s === undefined) throw new InputError("expected a name", where);
    return s;
  });
}

function exprMap(v: unknown, where: string): Record<string, string> {
  if (v === undefined || v === null) return {};
  const out: Record<string, string> = {};
  for (const [k, e] of Object.entries(record(v, where))) {
    const s = asStr(e);
    if (s === undefined) throw new InputError(`'${k}' must be an expression`, where);
    out[k] = s;
  }
  return out;
}

function readPort(v: unknown, where: string): Port {
  const o = record(v, where);
  const name = reqStr(o, "name", where);
  const mode = PORT_MODES.find((m) => m === o.mode);
  if (!mode) throw new InputError(`port '${name}' has unknown mode '${String(o.mode)}'`, where);
  const dimension = asStr(o.dimension);
  return dimension === undefined ? { name, mode } : { name, mode, dimension };
}

function readRegime(v: unknown, where: string): RegimeSpec {
  const o = record(v, where);
  const name = reqStr(o, "name", where);
  const at = `${where} regime '${name}'`;
  const transition = (t: Raw) => ({
    state_assignments: exprMap(t.state_assignments, at),
    output_events: names(t.output_events, at),
    target: asStr(t.target),
  });
  return {
    name,
    time_derivatives: exprMap(o.time_derivatives, at),
    on_events: asArray(o.on_events).map((t) => {
      const r = record(t, at);
      return { ...transition(r), port: reqStr(r, "port", at) };
    }),
    on_conditions: asArray(o.on_conditions).map((t) => {
      const r = record(t, at);
      return { ...transition(r), trigger: reqStr(r, "trigger", at) };
    }),
  };
}

export function readDynamics(v: unknown, fallbackName: string): Dynamics {
  const o = record(v, `dynamics '${fallbackName}'`);
  const name = asStr(o.name) ?? fallbackName;
  const where = `dynamics '${name}'`;
  const spec: DynamicsSpec = {
    name,
    parameters: names(o.parameters, where),
    state_variables: names(o.state_variables, where),
    aliases: exprMap(o.aliases, where),
    ports: asArray(o.ports).map((p) => readPort(p, where)),
    regimes: asArray(o.regimes).map((r) => readRegime(r, where)),
  };
  return defineDynamics(spec);
}

export function readValue(v: unknown, where: string): { value: PropertyValue; units?: string } {
  const n = asNum(v);
  if (n !== undefined) return { value: { kind: "single", value: n } };
  const o = record(v, where);
  const units = asStr(o.units);
  const withUnits = (value: PropertyValue) => (units === undefined ? { value } : { value, units });
  if (o.value !== undefined) {
    const single = asNum(o.value);
    if (single === undefined) throw new InputError("value must be a number", where);
    return withUnits({ kind: "single", value: single });
  }
  if (o.array !== undefined) {
    const values = asArray(o.array).map((x) => {
      const num = asNum(x);
      if (num === undefined) throw new InputError("array values must be numbers", where);
      return num;
    });
    return withUnits({ kind: "array", values });
  }
  if (o.random !== undefined) {
    const distribution = asStr(o.random);
    if (distribution === undefined) throw new InputError("random distribution must be named", where);
    const parameters: Record<string, number> = {};
    for (const [k, p] of Object.entries(isRecord(o.parameters) ? o.parameters : {})) {
      const num = asNum(p);
      if (num === undefined) throw new InputError(`distribution parameter '${k}' must be a number`, where);
      parameters[k] = num;
    }
    return withUnits({ kind: "random", distribution, parameters });
  }
  throw new InputError("expected a number or one of value/array/random", where);
}

function readProperties(v: unknown, where: string): Property[] {
  if (v === undefined || v === null) return [];
  return Object.entries(record(v, where)).map(([name, raw]) => ({ name, ...readValue(raw, `${where} property '${name}'`) }));
}

class Library {
  private readonly defs = new Map<string, Dynamics>();

  constructor(raw: unknown) {
    if (raw === undefined || raw === null) return;
    for (const [name, def] of Object.entries(record(raw, "components"))) {
      this.defs.set(name, readDynamics(def, name));
    }
  }

  resolve(v: unknown, where: string): Dynamics {
    if (typeof v === "string") {
      const d = this.defs.get(v);
      if (!d) throw new InputError(`unknown dynamics '${v}'`, where);
      return d;
    }
    return readDynamics(v, where);
  }

  properties(v: unknown, fallbackName: string, where: string): DynamicsProperties {
    const o = record(v, where);
    const definition = this.resolve(o.definition, where);
    const params = new Set(definition.parameters);
    const properties = readProperties(o.properties, where);
    for (const p of properties) {
      if (!params.has(p.name)) throw new InputError(`'${definition.name}' has no parameter '${p.name}'`, where);
    }
    const states = new Set(definition.stateVariables);
    const initialValues = readProperties(o.initial_values, where);
    for (const p of initialValues) {
      if (!states.has(p.name)) throw new InputError(`'${definition.name}' has no state variable '${p.name}'`, where);
    }
    return { kind: "properties", name: asStr(o.name) ?? fallbackName, definition, properties, initialValues };
  }
}

function readDelay(v: unknown, where: string): Scalar {
  if (v === undefined || v === null) return { value: 0, units: DEFAULT_DELAY_UNITS };
  const { value, units } = readValue(v, where);
  if (value.kind !== "single") throw new InputError("delay must be a single value", where);
  return { value: value.value, units: units ?? DEFAULT_DELAY_UNITS };
}

function readConnectivity(v: unknown, where: string): ConnectivityRule {
  if (typeof v === "string") return { name: v, definition: v, properties: [] };
  const o = record(v, where);
  const definition = reqStr(o, "definition", where);
  return { name: asStr(o.name) ?? definition, definition, properties: readProperties(o.properties, where) };
}

function readPortConnection(v: unknown, where: string): PortConnection {
  const o = record(v, where);
  const kind = COMMUNICATIONS.find((k) => k === o.kind);
  if (!kind) throw new InputError(`port connection kind must be 'event' or 'analog', got '${String(o.kind)}'`, where);
  return {
    senderRole: parseRole(reqStr(o, "sender", where), { projection: where }),
    receiverRole: parseRole(reqStr(o, "receiver", where), { projection: where }),
    sendPort: reqStr(o, "send_port", where),
    receivePort: reqStr(o, "receive_port", where),
    kind,
  };
}

/** Builds a Network from a parsed YAML, JSON or converted XML document. */
export function readNetwork(doc: unknown, source = "network"): Network {
  const o = record(doc, source);
  const lib = new Library(o.components);

  const populations: Population[] = asArray(o.populations).map((p, i) => {
    const r = record(p, `${source} population #${i}`);
    const name = reqStr(r, "name", `${source} population #${i}`);
    const where = `population '${name}'`;
    const size = asNum(r.size);
    if (size === undefined || size < 0 || !Number.isInteger(size)) throw new InputError("size must be a non-negative integer", where);
    return { name, size, cell: lib.properties(r.cell, `${name}_cell`, where) };
  });

  const refs = new Map<string, PopulationRef>();
  for (const p of populations) refs.set(p.name, { kind: "population", name: p.name });
  for (const s of asArray(o.selections)) {
    const r = record(s, `${source} selection`);
    const name = reqStr(r, "name", `${source} selection`);
    const members = names(r.populations, `selection '${name}'`);
    for (const m of members) {
      if (refs.get(m)?.kind !== "population") throw new InputError(`unknown population '${m}'`, `selection '${name}'`);
    }
    if (refs.has(name)) throw new InputError(`name '${name}' is already taken`, `selection '${name}'`);
    refs.set(name, { kind: "selection", name, populations: members });
  }
  const ref = (v: unknown, where: string): PopulationRef => {
    const name = asStr(v);
    const found = name === undefined ? undefined : refs.get(name);
    if (!found) throw new InputError(`unknown population or selection '${String(v)}'`, where);
    return found;
  };

  const projections: Projection[] = asArray(o.projections).map((p, i) => {
    const r = record(p, `${source} projection #${i}`);
    const name = reqStr(r, "name", `${source} projection #${i}`);
    const where = `projection '${name}'`;
    const proj: Projection = {
      name,
      pre: ref(r.source, where),
      post: ref(r.destination, where),
      connectivity: readConnectivity(r.connectivity, where),
      delay: readDelay(r.delay, where),
      response: lib.properties(r.response, `${name}_psr`, `${where} response`),
      portConnections: asArray(r.port_connections).map((pc) => readPortConnection(pc, name)),
    };
    if (r.plasticity !== undefined && r.plasticity !== null) {
      proj.plasticity = lib.properties(r.plasticity, `${name}_pls`, `${where} plasticity`);
    }
    return proj;
  });

  return { name: asStr(o.name) ?? source, populations, projections };
}

export function loadNetwork(file: string): Network {
  const text = readText(file);
  const ext = path.extname(file).toLowerCase();
  const doc = ext === ".xml" ? parseNineml(text) : yaml.load(text);
  return readNetwork(doc, path.basename(file));
}
