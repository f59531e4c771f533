export * from "./generation.types.js";
