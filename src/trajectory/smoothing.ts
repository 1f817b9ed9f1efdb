/* 中文注释：平滑与噪声：有限差分求速度/加速度，再按速度施加自适应高斯噪声 */
import type { RandomSource } from "../contracts/IRandomSource.js"
import type { TrajectoryConfig } from "../config/schema.js"
import { clamp } from "./core/curves.js"
import { deriveKinematics, magnitude } from "./core/kinematics.js"
import { gaussian } from "./core/random.js"
import type { Trajectory } from "./types.js"

const NOISE_SPEED_SCALE = 200
const NOISE_FACTOR_RANGE = [0.5, 2.0] as const

// 速度越快噪声越大
export function noiseFactor(speed: number): number {
  return clamp(speed / NOISE_SPEED_SCALE, NOISE_FACTOR_RANGE[0], NOISE_FACTOR_RANGE[1])
}

/**
 * 少于 3 个点时原样返回。噪声施加后不重新计算速度/加速度，由校验阶段按需重算。
 */
export function applySmoothingAndNoise(points: Trajectory, config: TrajectoryConfig, random: RandomSource): Trajectory {
  if (points.length < 3) return points

  const derived = deriveKinematics(points)
  for (let i = 1; i < derived.length; i++) {
    const p = derived[i]
    const stdDev = config.baseNoiseAmplitude * noiseFactor(magnitude(p.velocityX, p.velocityY))
    p.x += gaussian(random, 0, stdDev)
    p.y += gaussian(random, 0, stdDev)
  }
  return derived
}
