import { allOnConditions, allOnEvents, allTimeDerivatives, expandAliases, type Dynamics } from "./dynamics.js";
import { degreeIn, printExpr } from "./expr.js";
import { flattenMulti, type MultiComponent } from "./multi.js";

export type Classification =
  | { kind: "embeddable"; dynamics: Dynamics }
  | { kind: "unflattenable"; reason: string };

/**
 * Returns why `d` is not linear in its own state variables, or undefined
 * when it is. Linear here means a single regime, no on-conditions, and
 * every time derivative and on-event assignment of degree at most one in
 * the state variables once aliases are expanded.
 */
export function linearityViolation(d: Dynamics): string | undefined {
  if (d.regimes.length !== 1) return `has ${d.regimes.length} regimes`;
  if (allOnConditions(d).length > 0) return "has on-conditions";
  const states = new Set(d.stateVariables);
  for (const td of allTimeDerivatives(d)) {
    const rhs = expandAliases(d, td.rhs);
    if (degreeIn(rhs, states) > 1) return `d${td.variable}/dt = ${printExpr(rhs)} is not linear in its state`;
  }
  for (const oe of allOnEvents(d)) {
    for (const sa of oe.stateAssignments) {
      const rhs = expandAliases(d, sa.rhs);
      if (degreeIn(rhs, states) > 1) {
        return `assignment ${sa.variable} = ${printExpr(rhs)} on '${oe.srcPort}' is not linear in its state`;
      }
    }
  }
  return undefined;
}

export function isLinear(d: Dynamics): boolean {
  return linearityViolation(d) === undefined;
}

/** Decides whether a merged synapse can be embedded once per target cell. */
export function classifySynapse(synapse: MultiComponent): Classification {
  const dynamics = flattenMulti(synapse);
  const reason = linearityViolation(dynamics);
  if (reason !== undefined) return { kind: "unflattenable", reason: `'${synapse.name}' ${reason}` };
  return { kind: "embeddable", dynamics };
}
