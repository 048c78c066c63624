export * from "./types/index.js";
export * from "./session/index.js";
export * from "./extraction/index.js";
export * from "./scoring/index.js";
export * from "./runner/index.js";
export * from "./client/index.js";
export * from "./recording/index.js";
export * from "./config/index.js";
