/* 中文注释：骨架生成：无噪声几何路径（贝塞尔 / 弧线 / 缓动直线），按 t = i/N 采样 */
import type { RandomSource } from "../contracts/IRandomSource.js"
import type { TrajectoryConfig } from "../config/schema.js"
import { STEP_COUNT_RANGE } from "./constants.js"
import { clamp, cubicBezier, lerp, quadraticBezier } from "./core/curves.js"
import { chance, uniform } from "./core/random.js"
import { easeInOutCubic } from "./core/timing.js"
import { createPoint, type Point2D, type Trajectory, type TrajectoryPlan } from "./types.js"

const CUBIC_PROBABILITY = 0.6
const ARC_HEIGHT_RANGE = [0.1, 0.3] as const

type PathFunction = (t: number) => Point2D

/**
 * 分段数 N：时长除以随机采样间隔，限制在 [10, 100]
 */
export function sampleStepCount(duration: number, config: TrajectoryConfig, random: RandomSource): number {
  const interval = uniform(random, config.minTimeInterval, config.maxTimeInterval)
  return clamp(Math.floor(duration / interval), STEP_COUNT_RANGE[0], STEP_COUNT_RANGE[1])
}

export function bezierPath(plan: TrajectoryPlan, config: TrajectoryConfig, random: RandomSource): PathFunction {
  const { start, end, distance } = plan
  const mid: Point2D = { x: (start.x + end.x) / 2, y: (start.y + end.y) / 2 }
  const range = distance * config.bezierControlRange
  const c1: Point2D = { x: mid.x + uniform(random, -range, range), y: mid.y + uniform(random, -range, range) }
  if (chance(random, CUBIC_PROBABILITY)) {
    const c2: Point2D = { x: mid.x + uniform(random, -range / 2, range / 2), y: mid.y + uniform(random, -range / 2, range / 2) }
    return (t) => cubicBezier(start, c1, c2, end, t)
  }
  return (t) => quadraticBezier(start, c1, end, t)
}

export function arcPath(plan: TrajectoryPlan, random: RandomSource): PathFunction {
  const { start, end, distance } = plan
  const dx = end.x - start.x
  const dy = end.y - start.y
  let height = uniform(random, distance * ARC_HEIGHT_RANGE[0], distance * ARC_HEIGHT_RANGE[1])
  if (chance(random, 0.5)) height = -height
  // 偏移施加在与主方向垂直的轴上
  const horizontal = Math.abs(dx) > Math.abs(dy)
  return (t) => {
    const offset = height * Math.sin(Math.PI * t)
    const x = lerp(start.x, end.x, t)
    const y = lerp(start.y, end.y, t)
    return horizontal ? { x, y: y + offset } : { x: x + offset, y }
  }
}

export function curvedDirectPath(plan: TrajectoryPlan): PathFunction {
  const { start, end } = plan
  return (t) => {
    const e = easeInOutCubic(t)
    return { x: lerp(start.x, end.x, e), y: lerp(start.y, end.y, e) }
  }
}

/**
 * 生成骨架点序列（N + 1 个点）
 *
 * @param now 本次调用读取的时钟（秒），所有点共用
 */
export function generateSkeleton(plan: TrajectoryPlan, config: TrajectoryConfig, random: RandomSource, now: number): Trajectory {
  const path = plan.style === "bezier"
    ? bezierPath(plan, config, random)
    : plan.style === "arc"
      ? arcPath(plan, random)
      : curvedDirectPath(plan)

  const steps = sampleStepCount(plan.duration, config, random)
  const points: Trajectory = []
  for (let i = 0; i <= steps; i++) {
    const t = i / steps
    const p = path(t)
    points.push(createPoint(p.x, p.y, now + t * plan.duration))
  }
  return points
}
