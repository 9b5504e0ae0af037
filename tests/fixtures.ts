import type { DynamicsSpec } from "../src/dynamics.js";

export const LIF: DynamicsSpec = {
  name: "LIF",
  parameters: ["tau", "R", "v_thresh", "v_reset"],
  state_variables: ["v"],
  ports: [
    { name: "i_syn", mode: "analog_reduce" },
    { name: "spike", mode: "event_send" },
    { name: "bap", mode: "event_receive" },
    { name: "v", mode: "analog_send" },
  ],
  regimes: [
    {
      name: "sub",
      time_derivatives: { v: "(R * i_syn - v) / tau" },
      on_conditions: [{ trigger: "v > v_thresh", state_assignments: { v: "v_reset" }, output_events: ["spike"] }],
    },
  ],
};

function response(name: string, derivative: string): DynamicsSpec {
  return {
    name,
    parameters: ["tau_syn", "weight"],
    state_variables: ["a"],
    aliases: { i: "a" },
    ports: [
      { name: "spike", mode: "event_receive" },
      { name: "i", mode: "analog_send" },
    ],
    regimes: [
      {
        name: "default",
        time_derivatives: { a: derivative },
        on_events: [{ port: "spike", state_assignments: { a: "a + weight" } }],
      },
    ],
  };
}

export const EXP = response("Exp", "-a / tau_syn");
export const EXP_SQ = response("ExpSq", "-a * a / tau_syn");
export const DRIVE = response("Drive", "(weight - a) / tau_syn");
/** Linear in its state, but the weight scales the output current. */
export const SCALED: DynamicsSpec = { ...response("Scaled", "-a / tau_syn"), aliases: { i: "weight * a" } };

export const EXP_W: DynamicsSpec = {
  name: "ExpW",
  parameters: ["tau_syn"],
  state_variables: ["a"],
  aliases: { i: "a" },
  ports: [
    { name: "spike", mode: "event_receive" },
    { name: "w", mode: "analog_receive" },
    { name: "i", mode: "analog_send" },
  ],
  regimes: [
    {
      name: "default",
      time_derivatives: { a: "-a / tau_syn" },
      on_events: [{ port: "spike", state_assignments: { a: "a + w" } }],
    },
  ],
};

export const HEBB: DynamicsSpec = {
  name: "Hebb",
  parameters: ["eta"],
  state_variables: ["w"],
  ports: [
    { name: "pre_spike", mode: "event_receive" },
    { name: "w", mode: "analog_send" },
  ],
  regimes: [{ name: "default", on_events: [{ port: "pre_spike", state_assignments: { w: "w + eta" } }] }],
};

export type PortConnectionDoc = {
  sender: string;
  receiver: string;
  send_port: string;
  receive_port: string;
  kind: string;
};

export type ComponentDoc = {
  definition: string;
  properties: Record<string, unknown>;
  initial_values?: Record<string, unknown>;
};

export type ProjectionDoc = {
  name: string;
  source: string;
  destination: string;
  connectivity: unknown;
  delay: unknown;
  response: ComponentDoc;
  plasticity?: ComponentDoc;
  port_connections: PortConnectionDoc[];
};

export type PopulationDoc = { name: string; size: number; cell: ComponentDoc };

export type NetworkDoc = {
  name: string;
  components: Record<string, DynamicsSpec>;
  populations: PopulationDoc[];
  selections?: Array<{ name: string; populations: string[] }>;
  projections: ProjectionDoc[];
};

export function pc(sender: string, sendPort: string, receiver: string, receivePort: string, kind = "event"): PortConnectionDoc {
  return { sender, receiver, send_port: sendPort, receive_port: receivePort, kind };
}

export function population(name: string, size: number): PopulationDoc {
  return {
    name,
    size,
    cell: {
      definition: "LIF",
      properties: {
        tau: { value: 10, units: "ms" },
        R: { value: 1, units: "MOhm" },
        v_thresh: -50,
        v_reset: -65,
      },
      initial_values: { v: { value: -65, units: "mV" } },
    },
  };
}

/** Event drive pre -> synapse, current synapse -> post, and a back-propagating event post -> pre. */
export function projection(name: string, source: string, destination: string, responseDef = "Exp"): ProjectionDoc {
  return {
    name,
    source,
    destination,
    connectivity: { name: "R", definition: "R" },
    delay: { value: 2, units: "ms" },
    response: {
      definition: responseDef,
      properties: {
        tau_syn: { value: 5, units: "ms" },
        weight: { array: [0.5, 1.0], units: "nA" },
      },
    },
    port_connections: [
      pc("pre", "spike", "response", "spike"),
      pc("response", "i", "post", "i_syn", "analog"),
      pc("post", "spike", "pre", "bap"),
    ],
  };
}

/** Response driven by a plastic weight: the plasticity feeds the response's `w` input. */
export function plasticProjection(name: string, source: string, destination: string): ProjectionDoc {
  return {
    name,
    source,
    destination,
    connectivity: { name: "R", definition: "R" },
    delay: { value: 1, units: "ms" },
    response: { definition: "ExpW", properties: { tau_syn: { value: 5, units: "ms" } } },
    plasticity: {
      definition: "Hebb",
      properties: { eta: { random: "uniform", parameters: { low: 0, high: 0.1 } } },
      initial_values: { w: 0.5 },
    },
    port_connections: [
      pc("pre", "spike", "response", "spike"),
      pc("pre", "spike", "plasticity", "pre_spike"),
      pc("plasticity", "w", "response", "w", "analog"),
      pc("response", "i", "post", "i_syn", "analog"),
    ],
  };
}

/** A(10) -> B(5) through projection P. */
export function networkDoc(): NetworkDoc {
  return {
    name: "net",
    components: { LIF, Exp: EXP, ExpSq: EXP_SQ, Drive: DRIVE, Scaled: SCALED, ExpW: EXP_W, Hebb: HEBB },
    populations: [population("A", 10), population("B", 5)],
    projections: [projection("P", "A", "B")],
  };
}
