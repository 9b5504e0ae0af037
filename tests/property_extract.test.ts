import { describe, expect, it } from "vitest";
import { defineDynamics, type Property } from "../src/dynamics.js";
import { continuousParameters, extractConnectionPropertySets, varyingProperties } from "../src/property_extract.js";
import { DRIVE, EXP, SCALED } from "./fixtures.js";

const weights: Property = { name: "weight", value: { kind: "array", values: [0.5, 1, 1.5] }, units: "nA" };
const tau: Property = { name: "tau_syn", value: { kind: "single", value: 5 }, units: "ms" };

describe("varyingProperties", () => {
  it("keeps non-constant parameters only", () => {
    const d = defineDynamics(EXP);
    const stray: Property = { name: "other", value: { kind: "array", values: [1] } };
    expect([...varyingProperties(d, [weights, tau, stray]).keys()]).toEqual(["weight"]);
  });
});

describe("continuousParameters", () => {
  it("collects parameters of derivatives and conditions", () => {
    expect([...continuousParameters(defineDynamics(EXP))]).toEqual(["tau_syn"]);
    expect([...continuousParameters(defineDynamics(DRIVE))].sort()).toEqual(["tau_syn", "weight"]);
  });

  it("follows analog outputs through their aliases", () => {
    expect([...continuousParameters(defineDynamics(SCALED))].sort()).toEqual(["tau_syn", "weight"]);
  });
});

describe("extractConnectionPropertySets", () => {
  it("groups an event-only weight under its triggering port", () => {
    expect(extractConnectionPropertySets(defineDynamics(EXP), [weights, tau], "P")).toEqual({
      kind: "extracted",
      sets: [
        {
          port: "spike__P",
          properties: [{ name: "weight__P", value: { kind: "array", values: [0.5, 1, 1.5] }, units: "nA" }],
        },
      ],
    });
  });

  it("drops ports with nothing varying", () => {
    expect(extractConnectionPropertySets(defineDynamics(EXP), [tau], "P")).toEqual({ kind: "extracted", sets: [] });
  });

  it("reports a conflict when continuous dynamics read a varying property", () => {
    expect(extractConnectionPropertySets(defineDynamics(DRIVE), [weights, tau], "P")).toEqual({
      kind: "conflict",
      properties: ["weight"],
      reason: "'Drive' varies 'weight' per connection but its continuous dynamics depend on it",
    });
  });

  it("reports a conflict when a varying property scales an analog output", () => {
    expect(extractConnectionPropertySets(defineDynamics(SCALED), [weights, tau], "P")).toEqual({
      kind: "conflict",
      properties: ["weight"],
      reason: "'Scaled' varies 'weight' per connection but its continuous dynamics depend on it",
    });
  });

  it("treats random values as varying", () => {
    const random: Property = { name: "weight", value: { kind: "random", distribution: "normal", parameters: { mean: 1, sd: 0.1 } } };
    const result = extractConnectionPropertySets(defineDynamics(EXP), [random], "Q");
    expect(result.kind === "extracted" && result.sets.map((s) => s.port)).toEqual(["spike__Q"]);
  });
});
