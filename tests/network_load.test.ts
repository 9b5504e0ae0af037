import { fileURLToPath } from "url";
import { describe, expect, it } from "vitest";
import { summarize } from "../src/arrays.js";
import { InputError } from "../src/errors.js";
import { flattenNetwork } from "../src/network_flatten.js";
import { loadNetwork, readNetwork, readValue } from "../src/network_load.js";
import { parseNineml } from "../src/nineml_parse.js";
import { readText } from "../src/util.js";
import { networkDoc } from "./fixtures.js";

const fixture = (name: string): string => fileURLToPath(new URL(`./fixtures/${name}`, import.meta.url));

describe("readValue", () => {
  it("reads the three value forms", () => {
    expect(readValue(3, "x")).toEqual({ value: { kind: "single", value: 3 } });
    expect(readValue({ value: "2.5", units: "ms" }, "x")).toEqual({ value: { kind: "single", value: 2.5 }, units: "ms" });
    expect(readValue({ array: [1, "2"] }, "x")).toEqual({ value: { kind: "array", values: [1, 2] } });
    expect(readValue({ random: "normal", parameters: { mean: 0, sd: "1" }, units: "nA" }, "x")).toEqual({
      value: { kind: "random", distribution: "normal", parameters: { mean: 0, sd: 1 } },
      units: "nA",
    });
  });

  it("rejects anything else", () => {
    expect(() => readValue({ units: "ms" }, "delay")).toThrow("delay: expected a number or one of value/array/random");
    expect(() => readValue({ array: [1, "x"] }, "w")).toThrow(InputError);
  });
});

describe("loadNetwork", () => {
  it("reads a YAML network", () => {
    const net = loadNetwork(fixture("network.yaml"));
    expect(net.name).toBe("net");
    expect(net.populations.map((p) => [p.name, p.size, p.cell.definition.name])).toEqual([
      ["A", 10, "LIF"],
      ["B", 5, "LIF"],
    ]);
    const [p] = net.projections;
    expect(p.pre).toEqual({ kind: "population", name: "A" });
    expect(p.delay).toEqual({ value: 2, units: "ms" });
    expect(p.response.name).toBe("P_psr");
    expect(p.portConnections).toHaveLength(3);
    expect(p.plasticity).toBeUndefined();
  });

  it("reads the same network from XML", () => {
    const yaml = flattenNetwork(loadNetwork(fixture("network.yaml")));
    const xml = flattenNetwork(loadNetwork(fixture("network.xml")));
    expect(summarize(xml)).toEqual(summarize(yaml));
  });

  it("keeps XML component names and array order", () => {
    const net = readNetwork(parseNineml(readText(fixture("network.xml"))));
    const [p] = net.projections;
    expect(net.populations[0].cell.name).toBe("A_cell");
    expect(p.post).toEqual({ kind: "population", name: "B" });
    expect(p.response.properties.find((q) => q.name === "weight")?.value).toEqual({ kind: "array", values: [0.5, 1] });
  });

  it("flattens the loaded network like the in-code fixture", () => {
    expect(summarize(flattenNetwork(loadNetwork(fixture("network.yaml"))))).toEqual(
      summarize(flattenNetwork(readNetwork(networkDoc()))),
    );
  });
});

describe("readNetwork errors", () => {
  it("reports unknown components", () => {
    const doc = networkDoc();
    doc.projections[0].response.definition = "Nope";
    expect(() => readNetwork(doc)).toThrow("projection 'P' response: unknown dynamics 'Nope'");
  });

  it("checks property names against the definition", () => {
    const doc = networkDoc();
    doc.populations[0].cell.properties.gain = 2;
    expect(() => readNetwork(doc)).toThrow("population 'A': 'LIF' has no parameter 'gain'");
  });

  it("checks sizes and references", () => {
    const negative = networkDoc();
    negative.populations[0].size = -1;
    expect(() => readNetwork(negative)).toThrow("size must be a non-negative integer");
    const dangling = networkDoc();
    dangling.projections[0].destination = "Z";
    expect(() => readNetwork(dangling)).toThrow("unknown population or selection 'Z'");
  });

  it("rejects unknown roles and kinds", () => {
    const doc = networkDoc();
    doc.projections[0].port_connections[0].sender = "axon";
    expect(() => readNetwork(doc)).toThrow("Invalid port connection role 'axon'");
    const kind = networkDoc();
    kind.projections[0].port_connections[0].kind = "spike";
    expect(() => readNetwork(kind)).toThrow("port connection kind must be 'event' or 'analog'");
  });

  it("rejects XML without a NineML root", () => {
    expect(() => parseNineml("<Other/>")).toThrow(InputError);
  });
});
