/* 中文注释：有限差分求速度/加速度 */
import type { TrajectoryPoint } from "../types.js"

export interface Kinematics {
  velocityX: number
  velocityY: number
  accelerationX: number
  accelerationY: number
}

/**
 * 对整条序列做有限差分：i ≥ 1 求速度，i ≥ 2 求加速度。
 * dt ≤ 0（暂停导致时间戳倒序）时保留该点原有的派生量。
 */
export function deriveKinematics(points: readonly TrajectoryPoint[]): TrajectoryPoint[] {
  const out = points.map((p) => ({ ...p }))
  for (let i = 1; i < out.length; i++) {
    const dt = out[i].timestamp - out[i - 1].timestamp
    if (dt > 0) {
      out[i].velocityX = (out[i].x - out[i - 1].x) / dt
      out[i].velocityY = (out[i].y - out[i - 1].y) / dt
    }
  }
  for (let i = 2; i < out.length; i++) {
    const dt = out[i].timestamp - out[i - 1].timestamp
    if (dt > 0) {
      out[i].accelerationX = (out[i].velocityX - out[i - 1].velocityX) / dt
      out[i].accelerationY = (out[i].velocityY - out[i - 1].velocityY) / dt
    }
  }
  return out
}

/**
 * 以已接受的前一点为基准，计算当前点的速度与加速度；dt ≤ 0 时返回 undefined。
 */
export function kinematicsFrom(previous: TrajectoryPoint, current: Pick<TrajectoryPoint, "x" | "y" | "timestamp">): Kinematics | undefined {
  const dt = current.timestamp - previous.timestamp
  if (dt <= 0) return undefined
  const velocityX = (current.x - previous.x) / dt
  const velocityY = (current.y - previous.y) / dt
  return {
    velocityX,
    velocityY,
    accelerationX: (velocityX - previous.velocityX) / dt,
    accelerationY: (velocityY - previous.velocityY) / dt,
  }
}

export function magnitude(x: number, y: number): number {
  return Math.hypot(x, y)
}
