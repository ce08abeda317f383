export * from "./provider.types";
export * from "./translation.types";
