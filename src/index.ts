export * from "./trajectory/index.js";
export { createTrajectoryConfig, DEFAULT_TRAJECTORY_CONFIG, ConfigProvider, TrajectoryConfigSchema } from "./config/index.js";
export type { TrajectoryConfig, TrajectoryConfigInput } from "./config/index.js";
export { BaseError, ValidationError } from "./core/errors/index.js";
export { createLogger, PinoLogger } from "./logging/index.js";
export type { ILogger, RandomSource, Clock } from "./contracts/index.js";
