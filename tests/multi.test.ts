import { describe, expect, it } from "vitest";
import { defineDynamics, type DynamicsProperties, type DynamicsSpec } from "../src/dynamics.js";
import { NamespaceCollisionError, StructuralError, UnknownPortError } from "../src/errors.js";
import { printExpr } from "../src/expr.js";
import { createMultiComponent, flattenMulti, multiProperties, type MultiComponentInit } from "../src/multi.js";

function props(spec: DynamicsSpec, values: Record<string, number> = {}): DynamicsProperties {
  return {
    kind: "properties",
    name: spec.name,
    definition: defineDynamics(spec),
    properties: Object.entries(values).map(([name, value]) => ({ name, value: { kind: "single", value } })),
    initialValues: [],
  };
}

const source = props({
  name: "Src",
  state_variables: ["x"],
  ports: [
    { name: "x", mode: "analog_send" },
    { name: "fire", mode: "event_send" },
  ],
  regimes: [{ name: "on", time_derivatives: { x: "-x" } }, { name: "off" }],
});

const sink = props(
  {
    name: "Sink",
    parameters: ["tau"],
    state_variables: ["y"],
    ports: [
      { name: "inp", mode: "analog_reduce" },
      { name: "go", mode: "event_receive" },
    ],
    regimes: [{ name: "run", time_derivatives: { y: "inp / tau" }, on_events: [{ port: "go", state_assignments: { y: "0" } }] }],
  },
  { tau: 3 },
);

function pair(overrides: Partial<MultiComponentInit> = {}): MultiComponentInit {
  return {
    name: "M",
    subComponents: [
      ["src", source],
      ["snk", sink],
    ],
    portConnections: [
      { sender: "src", sendPort: "x", receiver: "snk", receivePort: "inp", kind: "analog" },
      { sender: "src", sendPort: "fire", receiver: "snk", receivePort: "go", kind: "event" },
    ],
    ...overrides,
  };
}

describe("createMultiComponent", () => {
  it("orders sub-components, connections and exposures", () => {
    const m = createMultiComponent(
      pair({
        portExposures: [
          { subComponent: "src", port: "x" },
          { subComponent: "snk", port: "inp" },
          { subComponent: "snk", port: "inp" },
        ],
      }),
    );
    expect(Object.keys(m.subComponents)).toEqual(["snk", "src"]);
    expect(m.portConnections.map((c) => `${c.sender}.${c.sendPort}`)).toEqual(["src.fire", "src.x"]);
    expect(m.portExposures).toEqual([
      { name: "inp__snk", subComponent: "snk", port: "inp", mode: "analog_reduce" },
      { name: "x__src", subComponent: "src", port: "x", mode: "analog_send" },
    ]);
  });

  it("rejects unsplittable or repeated sub-component names", () => {
    expect(() => createMultiComponent({ name: "M", subComponents: [["a__b", source]] })).toThrow(NamespaceCollisionError);
    expect(() =>
      createMultiComponent({
        name: "M",
        subComponents: [
          ["s", source],
          ["s", sink],
        ],
      }),
    ).toThrow("sub-component of 'M' declared twice");
  });

  it("checks connection endpoints", () => {
    expect(() =>
      createMultiComponent(
        pair({ portConnections: [{ sender: "snk", sendPort: "inp", receiver: "src", receivePort: "x", kind: "analog" }] }),
      ),
    ).toThrow(StructuralError);
    expect(() =>
      createMultiComponent(
        pair({ portConnections: [{ sender: "src", sendPort: "x", receiver: "snk", receivePort: "go", kind: "analog" }] }),
      ),
    ).toThrow("is declared analog but joins analog_send to event_receive");
    expect(() => createMultiComponent(pair({ portExposures: [{ subComponent: "snk", port: "nope" }] }))).toThrow(
      UnknownPortError,
    );
  });
});

describe("flattenMulti", () => {
  it("namespaces symbols and feeds connected inputs from their senders", () => {
    const d = flattenMulti(createMultiComponent(pair()));
    expect(d.parameters).toEqual(["tau__snk"]);
    expect(d.stateVariables).toEqual(["y__snk", "x__src"]);
    expect(d.ports).toEqual([]);
    expect(d.regimes.map((r) => r.name)).toEqual(["run___on", "run___off"]);
    const dy = d.regimes[0].timeDerivatives.find((td) => td.variable === "y__snk");
    expect(dy && printExpr(dy.rhs)).toBe("x__src / tau__snk");
    expect(d.localEvents).toEqual([{ sendPort: "fire__src", receivePort: "go__snk" }]);
    expect(d.regimes[1].onEvents.map((oe) => oe.srcPort)).toEqual(["go__snk"]);
  });

  it("keeps an exposed input as an extra term", () => {
    const d = flattenMulti(createMultiComponent(pair({ portExposures: [{ subComponent: "snk", port: "inp" }] })));
    expect(d.ports).toEqual([{ name: "inp__snk", mode: "analog_reduce" }]);
    const dy = d.regimes[0].timeDerivatives.find((td) => td.variable === "y__snk");
    expect(dy && printExpr(dy.rhs)).toBe("(inp__snk + x__src) / tau__snk");
  });

  it("retargets transitions within the combined regimes", () => {
    const toggler = props({
      name: "Tog",
      state_variables: ["s"],
      ports: [{ name: "flip", mode: "event_receive" }],
      regimes: [
        { name: "up", on_events: [{ port: "flip", target: "down" }] },
        { name: "down", on_events: [{ port: "flip", target: "up" }] },
      ],
    });
    const d = flattenMulti(
      createMultiComponent({
        name: "T",
        subComponents: [
          ["a", sink],
          ["b", toggler],
        ],
      }),
    );
    expect(d.regimes.map((r) => r.name)).toEqual(["run___up", "run___down"]);
    expect(d.regimes[0].onEvents.map((oe) => oe.targetRegime)).toEqual([undefined, "run___down"]);
  });

  it("namespaces properties of nested components", () => {
    const inner = createMultiComponent({ name: "I", subComponents: [["snk", sink]] });
    const outer = createMultiComponent({ name: "O", subComponents: [["P", inner]] });
    expect(multiProperties(outer).properties.map((p) => p.name)).toEqual(["tau__snk__P"]);
    expect(flattenMulti(outer).parameters).toEqual(["tau__snk__P"]);
  });
});
