export * from "./types";
export * from "./config";
export * from "./service";
export * from "./views";
