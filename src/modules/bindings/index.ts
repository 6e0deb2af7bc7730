export * from "./types";
export * from "./config";
export * from "./repository";
export * from "./service";
export * from "./leave";
