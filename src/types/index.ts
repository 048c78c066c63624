export * from "./config.js";
export * from "./case.js";
export * from "./data.js";
