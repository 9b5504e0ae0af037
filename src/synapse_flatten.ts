import { InvalidRoleError, StructuralError } from "./errors.js";
import { createMultiComponent, type ExposureRef, type InternalConnection, type MultiComponent, type SubComponent } from "./multi.js";
import type { PortConnection, Projection } from "./network.js";
import { RoleTable, type Role } from "./namespace.js";

export const RESPONSE_NAME = "psr";
export const PLASTICITY_NAME = "pls";
export const DEFAULT_SYNAPSE_SUFFIX = "_syn";

export type FlatSynapse = {
  synapse: MultiComponent;
  portConnections: PortConnection[];
};

type SynapseRole = "response" | "plasticity";
type CellRole = "pre" | "post";

function isSynapseRole(r: Role): r is SynapseRole {
  return r === "response" || r === "plasticity";
}

function isCellRole(r: Role): r is CellRole {
  return r === "pre" || r === "post";
}

/**
 * Merges the response and plasticity dynamics of a projection into one
 * synapse MultiComponent and rewrites the projection's port connections so
 * that synapse-side endpoints use the single "synapse" role with namespaced
 * port names.
 */
export function flattenSynapse(proj: Projection, suffix = DEFAULT_SYNAPSE_SUFFIX): FlatSynapse {
  const ctx = { projection: proj.name };
  const names = new RoleTable({ response: RESPONSE_NAME, plasticity: PLASTICITY_NAME });
  const subs: Array<[string, SubComponent]> = [[RESPONSE_NAME, proj.response]];
  if (proj.plasticity) subs.push([PLASTICITY_NAME, proj.plasticity]);
  const subName = (role: SynapseRole): string => {
    if (role === "plasticity" && !proj.plasticity) {
      throw new StructuralError("port connection refers to plasticity but the projection has none", ctx);
    }
    return names.require(role, ctx);
  };

  const internal: InternalConnection[] = [];
  const incoming: Array<PortConnection & { receiverRole: SynapseRole }> = [];
  const outgoing: Array<PortConnection & { senderRole: SynapseRole }> = [];
  const passthrough: PortConnection[] = [];
  for (const pc of proj.portConnections) {
    const { senderRole: s, receiverRole: r } = pc;
    if (!isSynapseRole(s) && !isCellRole(s)) throw new InvalidRoleError(s, ctx);
    if (!isSynapseRole(r) && !isCellRole(r)) throw new InvalidRoleError(r, ctx);
    if (isSynapseRole(s) && isSynapseRole(r)) {
      internal.push({
        sender: subName(s),
        receiver: subName(r),
        sendPort: pc.sendPort,
        receivePort: pc.receivePort,
        kind: pc.kind,
      });
    } else if (isSynapseRole(r)) {
      incoming.push({ ...pc, receiverRole: r });
    } else if (isSynapseRole(s)) {
      outgoing.push({ ...pc, senderRole: s });
    } else {
      passthrough.push(pc);
    }
  }

  const exposures: ExposureRef[] = [
    ...outgoing.map((pc) => ({ subComponent: subName(pc.senderRole), port: pc.sendPort })),
    ...incoming.map((pc) => ({ subComponent: subName(pc.receiverRole), port: pc.receivePort })),
  ];
  const synapse = createMultiComponent(
    { name: proj.name + suffix, subComponents: subs, portConnections: internal, portExposures: exposures },
    ctx,
  );

  const portConnections: PortConnection[] = [
    ...incoming.map((pc) => ({
      ...pc,
      receiverRole: "synapse" as const,
      receivePort: names.namespace(pc.receivePort, pc.receiverRole, ctx),
    })),
    ...outgoing.map((pc) => ({
      ...pc,
      senderRole: "synapse" as const,
      sendPort: names.namespace(pc.sendPort, pc.senderRole, ctx),
    })),
    ...passthrough,
  ];
  return { synapse, portConnections };
}
