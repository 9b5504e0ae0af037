#!/usr/bin/env node
import { summarize } from "./arrays.js";
import { loadRules, parseCliArgs } from "./config.js";
import { loadNetwork } from "./network_load.js";
import { flattenWithRules } from "./network_flatten.js";
import { writeText } from "./util.js";

function main() {
  const args = parseCliArgs(process.argv.slice(2));
  if (!args) {
    console.error("Usage: netflat <network.(yaml|yml|json|xml)> [out.json|-] [rules.yaml]");
    process.exit(1);
  }
  const { networkPath, outJson, rulesPath } = args;
  const rules = loadRules(rulesPath);
  const net = loadNetwork(networkPath);
  const result = flattenWithRules(net, rules);
  const json = JSON.stringify(summarize(result), null, rules.indent);
  if (outJson) writeText(outJson, json + "\n");
  else process.stdout.write(json + "\n");

  if (rules.verbose) {
    for (const a of result.componentArrays.values()) {
      const embedded = Object.keys(a.dynamics.subComponents).length - 1;
      console.error(
        `netflat: ${a.name} size=${a.size} embedded=${embedded} external=${a.synapses.length} ` +
          `property_sets=${a.connectionPropertySets.length}`,
      );
      for (const s of a.synapses) console.error(`netflat:   ${s.name} kept external: ${s.reason}`);
    }
  }
  console.error(`netflat: arrays=${result.componentArrays.size} groups=${result.connectionGroups.size}`);
}

try {
  main();
} catch (e) {
  console.error(e instanceof Error ? e.message : e);
  process.exit(1);
}
