import type { Communication, DynamicsProperties, Property } from "./dynamics.js";
import type { Role } from "./namespace.js";

export type Scalar = { value: number; units: string };

export type Population = {
  name: string;
  size: number;
  cell: DynamicsProperties;
};

export type PopulationRef =
  | { kind: "population"; name: string }
  | { kind: "selection"; name: string; populations: string[] };

export type ConnectivityRule = {
  name: string;
  definition: string;
  properties: Property[];
};

export type PortConnection = {
  senderRole: Role;
  receiverRole: Role;
  sendPort: string;
  receivePort: string;
  kind: Communication;
};

export type Projection = {
  name: string;
  pre: PopulationRef;
  post: PopulationRef;
  connectivity: ConnectivityRule;
  delay: Scalar;
  response: DynamicsProperties;
  plasticity?: DynamicsProperties;
  portConnections: PortConnection[];
};

export type Network = {
  name: string;
  populations: Population[];
  projections: Projection[];
};

export function members(ref: PopulationRef): string[] {
  return ref.kind === "population" ? [ref.name] : ref.populations;
}

export function touches(pc: PortConnection, role: Role): boolean {
  return pc.senderRole === role || pc.receiverRole === role;
}

export function portConnectionKey(pc: PortConnection): string {
  return [pc.senderRole, pc.sendPort, pc.receiverRole, pc.receivePort].join("__");
}
