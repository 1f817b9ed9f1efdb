import { describe, it, expect } from "vitest"
import { DEFAULT_TRAJECTORY_CONFIG } from "../../../src/config/trajectoryConfig.js"
import { mulberry32 } from "../../../src/trajectory/core/random.js"
import { generateSkeleton, sampleStepCount } from "../../../src/trajectory/skeleton.js"
import type { SkeletonStyle, TrajectoryPlan } from "../../../src/trajectory/types.js"
import { constantRandom, sequenceRandom } from "../../helpers/random.js"

const config = DEFAULT_TRAJECTORY_CONFIG

function plan(end: { x: number; y: number }, style: SkeletonStyle, duration = 1): TrajectoryPlan {
  const start = { x: 0, y: 0 }
  return { start, end, distance: Math.hypot(end.x, end.y), duration, style }
}

describe("sampleStepCount", () => {
  // random = 0.5 → 采样间隔 0.0165s
  it("时长 / 间隔，限制在 [10, 100]", () => {
    expect(sampleStepCount(1, config, constantRandom(0.5))).toBe(60)
    expect(sampleStepCount(0.05, config, constantRandom(0.5))).toBe(10)
    expect(sampleStepCount(3, config, constantRandom(0.5))).toBe(100)
  })
})

describe("generateSkeleton", () => {
  it("点数为 N + 1，时间戳基于同一次时钟读数", () => {
    const points = generateSkeleton(plan({ x: 100, y: 0 }, "curvedDirect"), config, constantRandom(0.5), 1000)
    expect(points).toHaveLength(61)
    expect(points[0].timestamp).toBe(1000)
    expect(points[15].timestamp).toBe(1000.25)
    expect(points[60].timestamp).toBe(1001)
  })

  it("缓动直线：慢起慢停，无几何弯曲", () => {
    const points = generateSkeleton(plan({ x: 100, y: 0 }, "curvedDirect"), config, constantRandom(0.5), 0)
    expect(points[0]).toMatchObject({ x: 0, y: 0 })
    expect(points[15].x).toBeCloseTo(6.25, 10)
    expect(points[30].x).toBeCloseTo(50, 10)
    expect(points[45].x).toBeCloseTo(93.75, 10)
    expect(points[60]).toMatchObject({ x: 100, y: 0 })
    expect(points.every((p) => p.y === 0)).toBe(true)
  })

  it("弧线：水平路径沿 y 偏移，高度为距离的 0.2（random = 0.5）", () => {
    const points = generateSkeleton(plan({ x: 400, y: 0 }, "arc"), config, constantRandom(0.5), 0)
    expect(points[30].x).toBeCloseTo(200, 10)
    expect(points[30].y).toBeCloseTo(80, 10)
    expect(points[60].x).toBeCloseTo(400, 10)
    expect(points[60].y).toBeCloseTo(0, 10)
  })

  it("弧线：反向与竖直路径", () => {
    const flipped = generateSkeleton(plan({ x: 400, y: 0 }, "arc"), config, sequenceRandom([0.5, 0.1, 0.5]), 0)
    expect(flipped[30].y).toBeCloseTo(-80, 10)

    const vertical = generateSkeleton(plan({ x: 0, y: 400 }, "arc"), config, constantRandom(0.5), 0)
    expect(vertical[30].x).toBeCloseTo(80, 10)
    expect(vertical[30].y).toBeCloseTo(200, 10)
  })

  it("贝塞尔：控制点落在中点时为三次直线", () => {
    const points = generateSkeleton(plan({ x: 100, y: 0 }, "bezier"), config, constantRandom(0.5), 0)
    expect(points).toHaveLength(61)
    expect(points[30].x).toBeCloseTo(50, 10)
    expect(points[30].y).toBeCloseTo(0, 10)
  })

  it("贝塞尔：random ≥ 0.6 时为二次曲线", () => {
    // 偏移范围 30，random = 0.7 → 控制点 (62, 12)；采样间隔 0.0199s → N = 50
    const points = generateSkeleton(plan({ x: 100, y: 0 }, "bezier"), config, constantRandom(0.7), 0)
    expect(points).toHaveLength(51)
    expect(points[25].x).toBeCloseTo(56, 8)
    expect(points[25].y).toBeCloseTo(6, 8)
  })

  it("所有样式首点精确等于起点、末点精确等于终点附近", () => {
    const random = mulberry32(11)
    for (const style of ["bezier", "arc", "curvedDirect"] as const) {
      for (let i = 0; i < 20; i++) {
        const points = generateSkeleton(plan({ x: 321, y: -123 }, style, 0.2 + random() * 2.8), config, random, 50)
        expect(points[0]).toMatchObject({ x: 0, y: 0, timestamp: 50 })
        expect(points[points.length - 1].x).toBeCloseTo(321, 6)
        expect(points[points.length - 1].y).toBeCloseTo(-123, 6)
        expect(points.length).toBeGreaterThanOrEqual(11)
        expect(points.length).toBeLessThanOrEqual(101)
      }
    }
  })
})
