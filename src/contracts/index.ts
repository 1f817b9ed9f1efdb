export type { ILogger } from "./ILogger.js";
export type { RandomSource, Clock } from "./IRandomSource.js";
