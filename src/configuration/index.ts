/**
 * Configuration entrypoint.
 *
 * Gotchas:
 * - Importing submodules directly (e.g., "./definitions") bypasses registration.
 *   Prefer `import { configStore } from "@/configuration"`.
 */
import "./register";

export * from "./definitions";
export * from "./provider";
export * from "./store";
export * from "./constants";
