export * from "./lookup.errors";
