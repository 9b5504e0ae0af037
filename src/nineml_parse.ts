import { pathToFileURL } from "url";
import { XMLParser } from "fast-xml-parser";
import { InputError } from "./errors.js";
import { asArray, asStr, isRecord, readText, writeText } from "./util.js";

type Raw = Record<string, unknown>;

const PORT_TAGS: Record<string, string> = {
  EventSendPort: "event_send",
  EventReceivePort: "event_receive",
  AnalogSendPort: "analog_send",
  AnalogReceivePort: "analog_receive",
  AnalogReducePort: "analog_reduce",
};

function extractText(val: unknown): string | undefined {
  if (val === undefined || val === null) return undefined;
  if (typeof val === "string" || typeof val === "number" || typeof val === "boolean") {
    return String(val);
  }
  if (isRecord(val) && "#text" in val && val["#text"] != null) return String(val["#text"]);
  return undefined;
}

function children(o: Raw, tag: string): Raw[] {
  // bare-text elements parse to strings; wrap them so attributes and text read alike
  return asArray(o[tag]).map((v) => (isRecord(v) ? v : { "#text": v }));
}

function child(o: Raw, tag: string): Raw | undefined {
  return children(o, tag)[0];
}

function attr(o: Raw, name: string): string | undefined {
  return asStr(o[`@_${name}`]);
}

function reqAttr(o: Raw, name: string, where: string): string {
  const v = attr(o, name);
  if (v === undefined) throw new InputError(`missing attribute '${name}'`, where);
  return v;
}

function math(o: Raw | undefined, where: string): string {
  const inline = o ? child(o, "MathInline") : undefined;
  const text = extractText(inline)?.trim();
  if (!text) throw new InputError("missing MathInline", where);
  return text;
}

function exprs(o: Raw, tag: string, key: string, where: string): Record<string, string> {
  const out: Record<string, string> = {};
  for (const e of children(o, tag)) out[reqAttr(e, key, where)] = math(e, where);
  return out;
}

function transition(t: Raw, where: string): Raw {
  const out: Raw = {
    state_assignments: exprs(t, "StateAssignment", "variable", where),
    output_events: children(t, "OutputEvent").map((e) => reqAttr(e, "port", where)),
  };
  const target = attr(t, "target_regime");
  if (target !== undefined) out.target = target;
  return out;
}

function convertDynamics(d: Raw): Raw {
  const name = reqAttr(d, "name", "Dynamics");
  const where = `Dynamics '${name}'`;
  const ports: Raw[] = [];
  for (const [tag, mode] of Object.entries(PORT_TAGS)) {
    for (const p of children(d, tag)) ports.push({ name: reqAttr(p, "name", where), mode, dimension: attr(p, "dimension") });
  }
  return {
    name,
    parameters: children(d, "Parameter").map((p) => reqAttr(p, "name", where)),
    state_variables: children(d, "StateVariable").map((s) => reqAttr(s, "name", where)),
    aliases: exprs(d, "Alias", "name", where),
    ports,
    regimes: children(d, "Regime").map((r) => {
      const regime = reqAttr(r, "name", where);
      const at = `${where} regime '${regime}'`;
      return {
        name: regime,
        time_derivatives: exprs(r, "TimeDerivative", "variable", at),
        on_events: children(r, "OnEvent").map((t) => ({ ...transition(t, at), port: reqAttr(t, "src_port", at) })),
        on_conditions: children(r, "OnCondition").map((t) => ({
          ...transition(t, at),
          trigger: math(child(t, "Trigger"), at),
        })),
      };
    }),
  };
}

function convertValue(p: Raw, where: string): unknown {
  const units = attr(p, "units");
  const withUnits = (v: Raw): Raw => (units === undefined ? v : { ...v, units });
  const single = child(p, "SingleValue");
  if (single) return withUnits({ value: extractText(single) });
  const array = child(p, "ArrayValue");
  if (array) {
    const rows = children(array, "ArrayValueRow")
      .map((r) => ({ index: Number(reqAttr(r, "index", where)), value: reqAttr(r, "value", where) }))
      .sort((a, b) => a.index - b.index);
    return withUnits({ array: rows.map((r) => r.value) });
  }
  const random = child(p, "RandomDistributionValue");
  if (random) {
    const parameters: Raw = {};
    for (const q of children(random, "Parameter")) parameters[reqAttr(q, "name", where)] = reqAttr(q, "value", where);
    return withUnits({ random: reqAttr(random, "distribution", where), parameters });
  }
  throw new InputError("expected SingleValue, ArrayValue or RandomDistributionValue", where);
}

function convertProperties(o: Raw, tag: string, where: string): Raw {
  const out: Raw = {};
  for (const p of children(o, tag)) {
    const name = reqAttr(p, "name", where);
    out[name] = convertValue(p, `${where} ${tag.toLowerCase()} '${name}'`);
  }
  return out;
}

function convertDynamicsProperties(holder: Raw | undefined, where: string): Raw | undefined {
  const dp = holder ? child(holder, "DynamicsProperties") : undefined;
  if (!dp) return undefined;
  const inline = child(dp, "Dynamics");
  const definition = inline ? convertDynamics(inline) : extractText(child(dp, "Definition"))?.trim();
  if (definition === undefined) throw new InputError("DynamicsProperties needs a Definition", where);
  const out: Raw = {
    definition,
    properties: convertProperties(dp, "Property", where),
    initial_values: convertProperties(dp, "Initial", where),
  };
  const name = attr(dp, "name");
  if (name !== undefined) out.name = name;
  return out;
}

function reference(holder: Raw | undefined, where: string): string {
  const ref = holder ? child(holder, "Reference") : undefined;
  const name = ref ? attr(ref, "name") ?? extractText(ref)?.trim() : undefined;
  if (!name) throw new InputError("missing Reference", where);
  return name;
}

function convertProjection(p: Raw): Raw {
  const name = reqAttr(p, "name", "Projection");
  const where = `Projection '${name}'`;
  const rule = child(child(p, "Connectivity") ?? {}, "ConnectionRuleProperties");
  if (!rule) throw new InputError("missing Connectivity/ConnectionRuleProperties", where);
  const connections = (tag: string, kind: string): Raw[] =>
    children(p, tag).map((pc) => ({
      sender: reqAttr(pc, "sender_role", where),
      receiver: reqAttr(pc, "receiver_role", where),
      send_port: reqAttr(pc, "send_port", where),
      receive_port: reqAttr(pc, "receive_port", where),
      kind,
    }));
  const delay = child(p, "Delay");
  const out: Raw = {
    name,
    source: reference(child(p, "Pre"), where),
    destination: reference(child(p, "Post"), where),
    connectivity: {
      name: attr(rule, "name"),
      definition: extractText(child(rule, "Definition"))?.trim(),
      properties: convertProperties(rule, "Property", where),
    },
    delay: delay ? convertValue(delay, `${where} delay`) : undefined,
    response: convertDynamicsProperties(child(p, "Response"), `${where} response`),
    port_connections: [
      ...connections("EventPortConnection", "event"),
      ...connections("AnalogPortConnection", "analog"),
    ],
  };
  const plasticity = convertDynamicsProperties(child(p, "Plasticity"), `${where} plasticity`);
  if (plasticity) out.plasticity = plasticity;
  return out;
}

/**
 * Converts a NineML-style XML document into the plain document shape that
 * readNetwork takes from YAML or JSON.
 */
export function parseNineml(text: string): Raw {
  const parser = new XMLParser({
    ignoreAttributes: false,
    attributeNamePrefix: "@_",
    parseTagValue: false,
    parseAttributeValue: false,
  });
  const doc: unknown = parser.parse(text);
  const root = isRecord(doc) ? doc.NineML : undefined;
  if (!isRecord(root)) throw new InputError("document has no NineML root element");

  const components: Raw = {};
  for (const d of children(root, "Dynamics")) {
    const conv = convertDynamics(d);
    components[String(conv.name)] = conv;
  }
  return {
    name: attr(root, "name"),
    components,
    populations: children(root, "Population").map((p) => {
      const name = reqAttr(p, "name", "Population");
      return {
        name,
        size: extractText(child(p, "Size"))?.trim(),
        cell: convertDynamicsProperties(child(p, "Cell"), `Population '${name}'`),
      };
    }),
    selections: children(root, "Selection").map((s) => {
      const name = reqAttr(s, "name", "Selection");
      const items = children(child(s, "Concatenate") ?? {}, "Item")
        .map((i) => ({ index: Number(attr(i, "index") ?? 0), name: extractText(i)?.trim() }))
        .sort((a, b) => a.index - b.index);
      return { name, populations: items.map((i) => i.name) };
    }),
    projections: children(root, "Projection").map(convertProjection),
  };
}

const isMain = !!process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href;
if (isMain) {
  const input = process.argv[2];
  const output = process.argv[3];
  if (!input || !output) {
    console.error("Usage: node dist/src/nineml_parse.js <in.xml> <out.json>");
    process.exit(1);
  }
  const doc = parseNineml(readText(input));
  writeText(output, JSON.stringify(doc, null, 2));
  console.error(
    `nineml_parse: components=${Object.keys(isRecord(doc.components) ? doc.components : {}).length} ` +
      `populations=${asArray(doc.populations).length} projections=${asArray(doc.projections).length}`,
  );
}
