/**
 * Error handling type definitions
 */

export * from "./error.types";
export * from "./retry.types";
