export * from "./types";
export * from "./config";
export * from "./outcome";
export * from "./repository";
export * from "./limiter";
export * from "./service";
export * from "./views";
