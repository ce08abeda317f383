export * from "./cache.types";
