/* 中文注释：短距离两点轨迹（跳过全部管线阶段） */
import type { RandomSource } from "../contracts/IRandomSource.js"
import { uniform } from "./core/random.js"
import { createPoint, type Point2D, type Trajectory } from "./types.js"

const END_JITTER_PX = 1
const ARRIVAL_DELAY_RANGE = [0.1, 0.3] as const

export function generateShortTrajectory(start: Point2D, end: Point2D, random: RandomSource, now: number): Trajectory {
  return [
    createPoint(start.x, start.y, now),
    createPoint(
      end.x + uniform(random, -END_JITTER_PX, END_JITTER_PX),
      end.y + uniform(random, -END_JITTER_PX, END_JITTER_PX),
      now + uniform(random, ARRIVAL_DELAY_RANGE[0], ARRIVAL_DELAY_RANGE[1]),
    ),
  ]
}
