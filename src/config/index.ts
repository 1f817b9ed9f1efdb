export { ConfigProvider } from "./ConfigProvider.js";
export { createTrajectoryConfig, DEFAULT_TRAJECTORY_CONFIG } from "./trajectoryConfig.js";
export { TrajectoryConfigSchema, EnvSchema } from "./schema.js";
export type { TrajectoryConfig, TrajectoryConfigInput, TrajectoryEnv } from "./schema.js";
