/**
 * Cuzick's nonparametric test for trend across ordered groups
 * @packageDocumentation
 */

export * from "./types.js";
export * from "./errors.js";
export * from "./validation.js";
export * from "./partition.js";
export * from "./ranks.js";
export * from "./normal.js";
export * from "./trend.js";
export * from "./cuzick.js";
