// Public entry point: types, errors and services.
export * from "./types/index.js";
export * from "./errors/index.js";
export * from "./services/index.js";
