/**
 * Barrel exports.
 *
 * This file re-exports the primary modules so consumers can import from `src`.
 * It is not required for the CLI/server but is convenient for library-style use.
 */
export * from "./types";
export * from "./random";
export * from "./bounds";
export * from "./domains";
export * from "./trend";
export * from "./coupling";
export * from "./baseline";
export * from "./resolver";
export * from "./assembler";
export * from "./simulators";
export * from "./historical";
export * from "./profiles";
export * from "./sink";
export * from "./ingest";
export * from "./errors";
export * from "./config";
export { createApp, liveTick, type AppDeps } from "./server";
