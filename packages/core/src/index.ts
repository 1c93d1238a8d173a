/**
 * Core package centralizes shared contracts and configuration helpers.
 * Everything else in the monorepo should depend on these primitives.
 */
export * from "./types";
export * from "./errors";
export * from "./time";
export * from "./schedule";
export * from "./env";
export * from "./config";
export * from "./exchange";
export * from "./utils/logger";
export * from "./strategies/ids";
export * from "./strategies/types";
export * from "./strategies/definition";
export * from "./strategies/registry";
export * from "./strategies/profiles";
export { Cci14ThresholdStrategy } from "./strategies/cci14-threshold";
export { Cci14CompareStrategy } from "./strategies/cci14-compare";
export { Cci14ReversalStrategy } from "./strategies/cci14-reversal";
