export * from "./errors.js";
export * from "./expr.js";
export * from "./namespace.js";
export * from "./dynamics.js";
export * from "./multi.js";
export * from "./network.js";
export * from "./synapse_flatten.js";
export * from "./linearity.js";
export * from "./property_extract.js";
export * from "./arrays.js";
export * from "./network_flatten.js";
export * from "./config.js";
export { loadNetwork, readDynamics, readNetwork, readValue } from "./network_load.js";
export { parseNineml } from "./nineml_parse.js";
