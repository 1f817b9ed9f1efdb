import { describe, it, expect, vi } from "vitest"
import type { ILogger } from "../../../src/contracts/ILogger.js"
import { createTrajectoryConfig } from "../../../src/config/trajectoryConfig.js"
import { ValidationError } from "../../../src/core/errors/ValidationError.js"
import { createLogger } from "../../../src/logging/createLogger.js"
import { MAX_TRAJECTORY_POINTS } from "../../../src/trajectory/constants.js"
import { mulberry32 } from "../../../src/trajectory/core/random.js"
import { generateTrajectory, TrajectoryGenerator } from "../../../src/trajectory/generator.js"
import type { Trajectory } from "../../../src/trajectory/types.js"

const logger = createLogger({ useSilent: true })
const clock = () => 1000

function expectInvariants(points: Trajectory, config = createTrajectoryConfig()): void {
  expect(points.length).toBeGreaterThanOrEqual(2)
  expect(points.length).toBeLessThanOrEqual(MAX_TRAJECTORY_POINTS)
  for (let i = 1; i < points.length; i++) {
    const gap = points[i].timestamp - points[i - 1].timestamp
    expect(gap).toBeGreaterThanOrEqual(config.minTimeInterval - 1e-9)
    expect(gap).toBeLessThanOrEqual(config.maxTimeInterval * 3 + 1e-9)
  }
  if (points.length === 2) return
  // 派生量必须是位置的有限差分
  for (let i = 1; i < points.length; i++) {
    const dt = points[i].timestamp - points[i - 1].timestamp
    expect(points[i].velocityX).toBeCloseTo((points[i].x - points[i - 1].x) / dt, 6)
    expect(points[i].velocityY).toBeCloseTo((points[i].y - points[i - 1].y) / dt, 6)
    expect(points[i].accelerationX).toBeCloseTo((points[i].velocityX - points[i - 1].velocityX) / dt, 6)
    expect(points[i].accelerationY).toBeCloseTo((points[i].velocityY - points[i - 1].velocityY) / dt, 6)
  }
}

describe("TrajectoryGenerator", () => {
  it("(100,100) → (300,300)：起点精确、终点接近目标、总时长在 [0.2, 3.0]", () => {
    for (let seed = 1; seed <= 10; seed++) {
      const points = new TrajectoryGenerator({ seed, clock, logger }).generate({ x: 100, y: 100 }, { x: 300, y: 300 })
      expect(points[0]).toMatchObject({ x: 100, y: 100, timestamp: 1000 })
      const last = points[points.length - 1]
      expect(Math.hypot(last.x - 300, last.y - 300)).toBeLessThan(30)
      const elapsed = last.timestamp - points[0].timestamp
      expect(elapsed).toBeGreaterThanOrEqual(0.2)
      expect(elapsed).toBeLessThanOrEqual(3.0)
      expectInvariants(points)
    }
  })

  it("(0,0) → (0,3)：恰好两个点且首点等于起点", () => {
    const points = new TrajectoryGenerator({ seed: 5, clock, logger }).generate({ x: 0, y: 0 }, { x: 0, y: 3 })
    expect(points).toHaveLength(2)
    expect(points[0]).toMatchObject({ x: 0, y: 0, timestamp: 1000 })
    expect(Math.abs(points[1].x)).toBeLessThanOrEqual(1)
    expect(Math.abs(points[1].y - 3)).toBeLessThanOrEqual(1)
  })

  it("固定种子与时钟时输出逐位一致", () => {
    const a = new TrajectoryGenerator({ seed: 42, clock, logger }).generate({ x: 10, y: 700 }, { x: 900, y: 40 })
    const b = new TrajectoryGenerator({ seed: 42, clock, logger }).generate({ x: 10, y: 700 }, { x: 900, y: 40 })
    expect(a).toStrictEqual(b)
    const c = new TrajectoryGenerator({ seed: 43, clock, logger }).generate({ x: 10, y: 700 }, { x: 900, y: 40 })
    expect(c).not.toStrictEqual(a)
  })

  it("显式随机源优先于种子", () => {
    const a = new TrajectoryGenerator({ random: mulberry32(8), seed: 1, clock, logger }).generate({ x: 0, y: 0 }, { x: 250, y: 90 })
    const b = new TrajectoryGenerator({ seed: 8, clock, logger }).generate({ x: 0, y: 0 }, { x: 250, y: 90 })
    expect(a).toStrictEqual(b)
  })

  it("时钟每次调用只读取一次", () => {
    const tick = vi.fn(() => 50)
    new TrajectoryGenerator({ seed: 3, clock: tick, logger }).generate({ x: 0, y: 0 }, { x: 500, y: 500 })
    expect(tick).toHaveBeenCalledTimes(1)
  })

  it("调用方时长决定总时长（无暂停、无过冲时）", () => {
    const config = { pauseProbability: 0, overshootProbability: 0 }
    for (let seed = 1; seed <= 5; seed++) {
      const points = new TrajectoryGenerator({ seed, clock, logger, config }).generate({ x: 0, y: 0 }, { x: 600, y: 0 }, 1.5)
      expect(points[points.length - 1].timestamp - points[0].timestamp).toBeCloseTo(1.5, 6)
    }
  })

  it("随机起终点与加压配置下不变量成立", () => {
    const random = mulberry32(123)
    const stressed = createTrajectoryConfig({ pauseProbability: 0.5, overshootProbability: 1, directionChangeProbability: 0.5 })
    for (let seed = 1; seed <= 40; seed++) {
      const start = { x: random() * 1920, y: random() * 1080 }
      const end = { x: random() * 1920, y: random() * 1080 }
      const duration = seed % 2 === 0 ? undefined : 0.2 + random() * 2.8
      expectInvariants(new TrajectoryGenerator({ seed, clock, logger }).generate(start, end, duration))
      expectInvariants(new TrajectoryGenerator({ seed, clock, logger, config: stressed }).generate(start, end, duration), stressed)
    }
  })

  it("不修改传入的配置并输出冻结配置", () => {
    const overrides = { pauseProbability: 0.2 }
    const generator = new TrajectoryGenerator({ config: overrides, logger })
    expect(generator.config.pauseProbability).toBe(0.2)
    expect(Object.isFrozen(generator.config)).toBe(true)
    expect(overrides).toEqual({ pauseProbability: 0.2 })
  })

  it("非法输入抛出 ValidationError", () => {
    const generator = new TrajectoryGenerator({ seed: 1, clock, logger })
    expect(() => generator.generate({ x: 0, y: 0 }, { x: 100, y: 100 }, -0.5)).toThrow(ValidationError)
    expect(() => generator.generate({ x: 0, y: Number.NaN }, { x: 100, y: 100 })).toThrow(ValidationError)
    expect(() => new TrajectoryGenerator({ config: { overshootProbability: 2 }, logger })).toThrow(ValidationError)
  })

  it("通过子日志记录器输出阶段统计", () => {
    const debug = vi.fn()
    const child: ILogger = { debug, info: vi.fn(), warn: vi.fn(), error: vi.fn(), child: vi.fn() }
    const parent: ILogger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn(), child: vi.fn(() => child) }

    new TrajectoryGenerator({ seed: 2, clock, logger: parent }).generate({ x: 0, y: 0 }, { x: 400, y: 0 })

    expect(parent.child).toHaveBeenCalledWith({ module: "trajectory" })
    expect(debug).toHaveBeenCalledTimes(1)
    const [fields, msg] = debug.mock.calls[0]
    expect(msg).toBe("轨迹生成完成")
    expect(fields).toMatchObject({ distance: 400 })
  })

  it("阶段统计中的 overLimit 与输出中超限的已接受点一致", () => {
    const debug = vi.fn()
    const child: ILogger = { debug, info: vi.fn(), warn: vi.fn(), error: vi.fn(), child: vi.fn() }
    const parent: ILogger = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn(), child: vi.fn(() => child) }
    const config = createTrajectoryConfig()

    for (let seed = 1; seed <= 5; seed++) {
      debug.mockClear()
      const points = new TrajectoryGenerator({ seed, clock, logger: parent }).generate({ x: 100, y: 100 }, { x: 900, y: 600 })
      const exceeding = points
        .slice(1)
        .filter((p) => !p.synthesized && Math.hypot(p.accelerationX, p.accelerationY) > config.maxAcceleration)
      const [fields] = debug.mock.calls[0]
      expect(fields).toMatchObject({ overLimit: exceeding.length })
    }
  })
})

describe("generateTrajectory", () => {
  it("与生成器实例结果一致", () => {
    const a = generateTrajectory({ x: 20, y: 20 }, { x: 620, y: 420 }, { seed: 77, clock, logger, duration: 0.9 })
    const b = new TrajectoryGenerator({ seed: 77, clock, logger }).generate({ x: 20, y: 20 }, { x: 620, y: 420 }, 0.9)
    expect(a).toStrictEqual(b)
  })
})
