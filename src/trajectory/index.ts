/**
 * 拟人化轨迹管线
 *
 * 规划器 → 骨架生成 → 人性化特征注入 → 平滑与噪声 → 校验重采样；
 * 距离小于 5 像素时由短轨迹兜底。
 *
 * @packageDocumentation
 */

export { TrajectoryGenerator, generateTrajectory, systemClock } from "./generator.js"
export type { TrajectoryGeneratorOptions } from "./generator.js"
export { planTrajectory, chooseSkeletonStyle, estimateDuration, LONG_DISTANCE_STYLE_WEIGHTS, SHORT_DISTANCE_STYLE_WEIGHTS } from "./planner.js"
export type { PlanResult } from "./planner.js"
export { generateSkeleton, sampleStepCount } from "./skeleton.js"
export { injectHumanCharacteristics, addOvershoot } from "./characteristics.js"
export { applySmoothingAndNoise, noiseFactor } from "./smoothing.js"
export { validateTrajectory, classifyGap } from "./validator.js"
export type { GapDecision, ValidationStats } from "./validator.js"
export { generateShortTrajectory } from "./fallback.js"
export { summarizeTrajectory, toPointRecords, toNdjson, formatTable, formatSummary, renderTrajectory, OUTPUT_FORMATS } from "./export.js"
export type { TrajectorySummary, PointRecord, OutputFormat } from "./export.js"
export { mulberry32, defaultRandom } from "./core/random.js"
export { DURATION_RANGE, STEP_COUNT_RANGE, MAX_TRAJECTORY_POINTS } from "./constants.js"
export { createPoint } from "./types.js"
export type { Point2D, TrajectoryPoint, Trajectory, SkeletonStyle, TrajectoryPlan } from "./types.js"
