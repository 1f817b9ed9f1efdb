/* 中文注释：校验与重采样：逐点修正时间间隔、修补大间隔、抑制加速度突变 */
import type { RandomSource } from "../contracts/IRandomSource.js"
import type { TrajectoryConfig } from "../config/schema.js"
import { GAP_REPAIR_FACTOR, MAX_TRAJECTORY_POINTS } from "./constants.js"
import { lerp } from "./core/curves.js"
import { kinematicsFrom, magnitude, type Kinematics } from "./core/kinematics.js"
import { uniform } from "./core/random.js"
import type { Trajectory, TrajectoryPoint } from "./types.js"

const INTERMEDIATE_JITTER_PX = 1
// 每个点的中点折半次数上限
const MAX_DAMPING_HALVINGS = 2

/**
 * 相邻点的时间间隔处理方式：
 * - clamp：间隔过小，时间戳推到 previous + minTimeInterval 后接受
 * - repair：间隔过大，插入 count 个插值点（间距不小于 minTimeInterval），当前点丢弃
 * - compress：间隔过大但插值会突破点数上限，时间戳压缩到允许的最大间隔后接受
 * - accept：原样接受
 */
export type GapDecision =
  | { kind: "clamp" }
  | { kind: "repair"; count: number }
  | { kind: "compress" }
  | { kind: "accept" }

export interface ValidationStats {
  clamped: number
  repaired: number
  inserted: number
  compressed: number
  damped: number
  /** 阻尼后派生加速度仍超过上限的已接受点（含保持原位的终点） */
  overLimit: number
}

/**
 * @param capacity 插值后仍可容纳的额外点数
 */
export function classifyGap(dt: number, config: TrajectoryConfig, capacity: number): GapDecision {
  if (dt < config.minTimeInterval) return { kind: "clamp" }
  if (dt > config.maxTimeInterval * GAP_REPAIR_FACTOR) {
    // 插值点间距 dt / (count + 1) 不得小于 minTimeInterval
    const count = Math.min(Math.floor(dt / config.maxTimeInterval), Math.floor(dt / config.minTimeInterval) - 1)
    return count <= capacity ? { kind: "repair", count } : { kind: "compress" }
  }
  return { kind: "accept" }
}

export function interpolateGap(previous: TrajectoryPoint, current: TrajectoryPoint, count: number, random: RandomSource): Trajectory {
  const inserted: Trajectory = []
  let anchor = previous
  for (let j = 1; j <= count; j++) {
    const t = j / (count + 1)
    const point: TrajectoryPoint = {
      x: lerp(previous.x, current.x, t) + uniform(random, -INTERMEDIATE_JITTER_PX, INTERMEDIATE_JITTER_PX),
      y: lerp(previous.y, current.y, t) + uniform(random, -INTERMEDIATE_JITTER_PX, INTERMEDIATE_JITTER_PX),
      timestamp: lerp(previous.timestamp, current.timestamp, t),
      velocityX: 0,
      velocityY: 0,
      accelerationX: 0,
      accelerationY: 0,
      synthesized: true,
    }
    const k = kinematicsFrom(anchor, point)
    const settled = k ? { ...point, ...k } : point
    inserted.push(settled)
    anchor = settled
  }
  return inserted
}

function accelerationOf(k: Kinematics): number {
  return magnitude(k.accelerationX, k.accelerationY)
}

/**
 * 接受一个点：相对上一个已接受点重算派生量。加速度超限时向上一点做中点折半
 * （至多 MAX_DAMPING_HALVINGS 次，达标即停），取加速度最小的位置；速度与加速度
 * 始终是该位置的真实有限差分。
 *
 * @param anchored 为真时保持原位置，不做折半（用于终点）
 */
export function settlePoint(
  previous: TrajectoryPoint,
  current: TrajectoryPoint,
  config: TrajectoryConfig,
  anchored = false,
): { point: TrajectoryPoint; damped: boolean; withinLimit: boolean } {
  const point: TrajectoryPoint = { ...current, synthesized: false }
  const k = kinematicsFrom(previous, point)
  if (!k) return { point, damped: false, withinLimit: true }
  const withinLimit = accelerationOf(k) <= config.maxAcceleration
  if (withinLimit || anchored) return { point: { ...point, ...k }, damped: false, withinLimit }

  let best: { point: TrajectoryPoint; acceleration: number } | undefined
  let candidate = point
  for (let step = 0; step < MAX_DAMPING_HALVINGS; step++) {
    candidate = { ...candidate, x: (candidate.x + previous.x) / 2, y: (candidate.y + previous.y) / 2 }
    const damped = kinematicsFrom(previous, candidate)
    if (!damped) break
    const acceleration = accelerationOf(damped)
    if (!best || acceleration < best.acceleration) best = { point: { ...candidate, ...damped }, acceleration }
    if (acceleration <= config.maxAcceleration) break
  }
  if (!best) return { point: { ...point, ...k }, damped: false, withinLimit: false }
  return { point: best.point, damped: true, withinLimit: best.acceleration <= config.maxAcceleration }
}

/**
 * 最终校验。输出以第一个输入点为起点，其余点逐一与最后一个已接受点比较。
 *
 * 间隔超过 3 × maxTimeInterval 时插入的中间点替代当前点；插入会使总点数
 * 超过 MAX_TRAJECTORY_POINTS 时改为压缩间隔。最后一个输入点被接受时不做中点阻尼。
 * 折半后仍无法满足加速度上限的点保留真实派生量，计入 stats.overLimit。
 */
export function validateTrajectory(
  points: Trajectory,
  config: TrajectoryConfig,
  random: RandomSource,
): { points: Trajectory; stats: ValidationStats } {
  const stats: ValidationStats = { clamped: 0, repaired: 0, inserted: 0, compressed: 0, damped: 0, overLimit: 0 }
  if (points.length < 2) return { points: points.map((p) => ({ ...p })), stats }

  const validated: Trajectory = [{ ...points[0] }]
  for (let i = 1; i < points.length; i++) {
    const previous = validated[validated.length - 1]
    const current: TrajectoryPoint = { ...points[i] }
    const remaining = points.length - 1 - i
    const capacity = MAX_TRAJECTORY_POINTS - validated.length - remaining
    const decision = classifyGap(current.timestamp - previous.timestamp, config, capacity)

    switch (decision.kind) {
      case "repair": {
        const inserted = interpolateGap(previous, current, decision.count, random)
        validated.push(...inserted)
        stats.repaired++
        stats.inserted += inserted.length
        continue
      }
      case "clamp":
        current.timestamp = previous.timestamp + config.minTimeInterval
        stats.clamped++
        break
      case "compress":
        current.timestamp = previous.timestamp + config.maxTimeInterval * GAP_REPAIR_FACTOR
        stats.compressed++
        break
      case "accept":
        break
    }

    const { point, damped, withinLimit } = settlePoint(previous, current, config, i === points.length - 1)
    if (damped) stats.damped++
    if (!withinLimit) stats.overLimit++
    validated.push(point)
  }
  return { points: validated, stats }
}
