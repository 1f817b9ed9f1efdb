/* 中文注释：规划器：按距离推导时长与骨架样式，距离过短时转入两点短轨迹 */
import type { RandomSource } from "../contracts/IRandomSource.js"
import type { TrajectoryConfig } from "../config/schema.js"
import { ValidationError } from "../core/errors/ValidationError.js"
import { DURATION_RANGE, SHORT_DISTANCE_THRESHOLD } from "./constants.js"
import { clamp, distanceBetween } from "./core/curves.js"
import { uniform, weightedChoice, type Weighted } from "./core/random.js"
import type { Point2D, SkeletonStyle, TrajectoryPlan } from "./types.js"

export type PlanResult =
  | { kind: "short"; start: Point2D; end: Point2D; distance: number }
  | ({ kind: "full" } & TrajectoryPlan)

// 远距离偏向贝塞尔，近距离偏向缓动直线
export const LONG_DISTANCE_STYLE_WEIGHTS: readonly Weighted<SkeletonStyle>[] = [
  { value: "bezier", weight: 0.5 },
  { value: "arc", weight: 0.3 },
  { value: "curvedDirect", weight: 0.2 },
]

export const SHORT_DISTANCE_STYLE_WEIGHTS: readonly Weighted<SkeletonStyle>[] = [
  { value: "bezier", weight: 0.3 },
  { value: "arc", weight: 0.2 },
  { value: "curvedDirect", weight: 0.5 },
]

const LONG_STYLE_DISTANCE = 300

export function assertPoint(p: Point2D, field: string): void {
  if (!Number.isFinite(p.x) || !Number.isFinite(p.y)) {
    throw new ValidationError(`${field} 坐标必须为有限数`, { field, value: p, expected: "finite x/y" })
  }
}

export function assertDuration(duration: number | undefined): void {
  if (duration === undefined) return
  if (!Number.isFinite(duration) || duration <= 0) {
    throw new ValidationError("时长必须为正的有限数（秒）", { field: "duration", value: duration, expected: "finite number > 0" })
  }
}

/**
 * 由距离推导时长：随机基础速度 → 远/近距离修正 → 整体速度波动 → 限制在 [0.2, 3.0] 秒
 */
export function estimateDuration(distance: number, config: TrajectoryConfig, random: RandomSource): number {
  const speed = uniform(random, config.avgSpeedRange[0], config.avgSpeedRange[1])
  let duration = distance / speed
  if (distance > 500) duration *= uniform(random, 1.1, 1.3)
  else if (distance < 100) duration *= uniform(random, 0.8, 1.0)
  duration *= uniform(random, config.speedVariationRange[0], config.speedVariationRange[1])
  return clamp(duration, DURATION_RANGE[0], DURATION_RANGE[1])
}

export function chooseSkeletonStyle(distance: number, random: RandomSource): SkeletonStyle {
  return weightedChoice(random, distance > LONG_STYLE_DISTANCE ? LONG_DISTANCE_STYLE_WEIGHTS : SHORT_DISTANCE_STYLE_WEIGHTS)
}

/**
 * 规划一次轨迹生成
 *
 * @param duration 调用方指定时长（秒）；给定时限制在 [0.2, 3.0]
 * @throws ValidationError 坐标非有限数，或时长非正/非有限
 */
export function planTrajectory(
  start: Point2D,
  end: Point2D,
  duration: number | undefined,
  config: TrajectoryConfig,
  random: RandomSource,
): PlanResult {
  assertPoint(start, "start")
  assertPoint(end, "end")
  assertDuration(duration)

  const distance = distanceBetween(start, end)
  if (distance < SHORT_DISTANCE_THRESHOLD) return { kind: "short", start, end, distance }

  const resolved = duration === undefined
    ? estimateDuration(distance, config, random)
    : clamp(duration, DURATION_RANGE[0], DURATION_RANGE[1])
  const style = chooseSkeletonStyle(distance, random)
  return { kind: "full", start, end, distance, duration: resolved, style }
}
