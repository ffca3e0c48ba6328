export * from "./payoff/legs";
export * from "./payoff/range";
export * from "./payoff/table";
export * from "./analytics/summary";
export * from "./strategies/jadeLizard";
export * from "./strategies/reverseJadeLizard";
export { range, roundTo } from "./utils/number";
