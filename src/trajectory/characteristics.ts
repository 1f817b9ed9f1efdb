/* 中文注释：人性化特征注入：微调、停顿、角度抖动（累积）、末端过冲回调 */
import type { RandomSource } from "../contracts/IRandomSource.js"
import type { TrajectoryConfig } from "../config/schema.js"
import { chance, uniform } from "./core/random.js"
import { createPoint, type Trajectory, type TrajectoryPoint } from "./types.js"

const MICRO_CORRECTION_PX = 3
const PAUSE_RANGE = [0.05, 0.2] as const
const ANGLE_JITTER_RAD = 0.2
const OVERSHOOT_DISTANCE_RANGE = [5, 15] as const
const OVERSHOOT_DELAY_RANGE = [0.05, 0.1] as const
const CORRECTION_DELAY_RANGE = [0.1, 0.2] as const
const CORRECTION_JITTER_PX = 2
const OVERSHOOT_MIN_POINTS = 5

function rotate(dx: number, dy: number, angle: number): { dx: number; dy: number } {
  const cos = Math.cos(angle)
  const sin = Math.sin(angle)
  return { dx: dx * cos - dy * sin, dy: dx * sin + dy * cos }
}

/**
 * 在末端追加过冲点与回调点；点数不足 5 或末段方向无定义时原样返回
 */
export function addOvershoot(points: Trajectory, random: RandomSource): Trajectory {
  if (points.length < OVERSHOOT_MIN_POINTS) return points
  const target = points[points.length - 1]
  const preTarget = points[points.length - 2]
  const dx = target.x - preTarget.x
  const dy = target.y - preTarget.y
  const length = Math.hypot(dx, dy)
  if (length === 0) return points

  const reach = uniform(random, OVERSHOOT_DISTANCE_RANGE[0], OVERSHOOT_DISTANCE_RANGE[1])
  const overshoot = createPoint(
    target.x + (dx / length) * reach,
    target.y + (dy / length) * reach,
    target.timestamp + uniform(random, OVERSHOOT_DELAY_RANGE[0], OVERSHOOT_DELAY_RANGE[1]),
  )
  const correction = createPoint(
    target.x + uniform(random, -CORRECTION_JITTER_PX, CORRECTION_JITTER_PX),
    target.y + uniform(random, -CORRECTION_JITTER_PX, CORRECTION_JITTER_PX),
    overshoot.timestamp + uniform(random, CORRECTION_DELAY_RANGE[0], CORRECTION_DELAY_RANGE[1]),
  )
  return [...points, overshoot, correction]
}

/**
 * 对骨架逐点施加人性化扰动；少于 3 个点时原样返回。
 *
 * 起点不做任何扰动。角度抖动以“上一个已处理点”为旋转中心，误差沿路径累积。
 */
export function injectHumanCharacteristics(points: Trajectory, config: TrajectoryConfig, random: RandomSource): Trajectory {
  if (points.length < 3) return points

  const processed: Trajectory = []
  points.forEach((raw, i) => {
    const point: TrajectoryPoint = createPoint(raw.x, raw.y, raw.timestamp)
    if (i > 0) {
      if (chance(random, config.microCorrectionProbability)) {
        point.x += uniform(random, -MICRO_CORRECTION_PX, MICRO_CORRECTION_PX)
        point.y += uniform(random, -MICRO_CORRECTION_PX, MICRO_CORRECTION_PX)
      }
      if (chance(random, config.pauseProbability)) {
        point.timestamp += uniform(random, PAUSE_RANGE[0], PAUSE_RANGE[1])
      }
      if (chance(random, config.directionChangeProbability)) {
        const previous = processed[i - 1]
        const angle = uniform(random, -ANGLE_JITTER_RAD, ANGLE_JITTER_RAD)
        const r = rotate(point.x - previous.x, point.y - previous.y, angle)
        point.x = previous.x + r.dx
        point.y = previous.y + r.dy
      }
    }
    processed.push(point)
  })

  return chance(random, config.overshootProbability) ? addOvershoot(processed, random) : processed
}
