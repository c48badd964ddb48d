export * from "./lounge.types.js";
export * from "./api.types.js";
export * from "./result.types.js";
