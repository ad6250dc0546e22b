export * from "./constants.js";
export * from "./types/agent.js";
export * from "./types/bond.js";
export * from "./types/action.js";
export * from "./types/ledger.js";
export * from "./types/world.js";
export * from "./types/observation.js";
export * from "./types/report.js";
export * from "./types/api.js";
