import yaml from "js-yaml";
import { InputError } from "./errors.js";
import { asNum, isRecord, readText } from "./util.js";

export type FlattenRules = {
  cell_role: string;
  synapse_suffix: string;
  indent: number;
  verbose: boolean;
};

export const defaultRules: FlattenRules = {
  cell_role: "cell",
  synapse_suffix: "_syn",
  indent: 2,
  verbose: false,
};

function nonEmpty(v: unknown): string | undefined {
  return typeof v === "string" && v.trim().length > 0 ? v.trim() : undefined;
}

export function mergeRules(raw: unknown): FlattenRules {
  if (raw === undefined || raw === null) return { ...defaultRules };
  if (!isRecord(raw)) throw new InputError("rules must be a mapping");
  const indent = asNum(raw.indent);
  return {
    cell_role: nonEmpty(raw.cell_role) ?? defaultRules.cell_role,
    synapse_suffix: typeof raw.synapse_suffix === "string" ? raw.synapse_suffix : defaultRules.synapse_suffix,
    indent: indent !== undefined && indent >= 0 ? Math.floor(indent) : defaultRules.indent,
    verbose: typeof raw.verbose === "boolean" ? raw.verbose : defaultRules.verbose,
  };
}

export function loadRules(path?: string): FlattenRules {
  if (!path) return { ...defaultRules };
  return mergeRules(yaml.load(readText(path)));
}

export type CliArgs = {
  networkPath: string;
  // undefined writes to stdout
  outJson?: string;
  rulesPath?: string;
};

const RULES_EXT = /\.ya?ml$/i;

/**
 * `<network> [out.json|-] [rules.yaml]`. With two arguments a YAML second
 * one is the rules file, since output is always JSON.
 */
export function parseCliArgs(argv: string[]): CliArgs | undefined {
  const [networkPath, second, third] = argv;
  if (!networkPath) return undefined;
  if (second !== undefined && third === undefined && RULES_EXT.test(second)) {
    return { networkPath, rulesPath: second };
  }
  return {
    networkPath,
    outJson: second === undefined || second === "-" ? undefined : second,
    rulesPath: third,
  };
}
