import { describe, it, expect } from "vitest"
import { clamp, cubicBezier, distanceBetween, lerp, quadraticBezier } from "../../../../src/trajectory/core/curves.js"
import { easeInOutCubic } from "../../../../src/trajectory/core/timing.js"

describe("curves", () => {
  it("贝塞尔端点与中点", () => {
    const p0 = { x: 0, y: 0 }
    const p3 = { x: 100, y: 0 }
    expect(cubicBezier(p0, { x: 0, y: 100 }, { x: 100, y: 100 }, p3, 0)).toEqual(p0)
    expect(cubicBezier(p0, { x: 0, y: 100 }, { x: 100, y: 100 }, p3, 1)).toEqual(p3)
    expect(cubicBezier(p0, { x: 0, y: 100 }, { x: 100, y: 100 }, p3, 0.5)).toEqual({ x: 50, y: 75 })
    expect(quadraticBezier(p0, { x: 50, y: 100 }, p3, 0.5)).toEqual({ x: 50, y: 50 })
    expect(quadraticBezier(p0, { x: 50, y: 100 }, p3, 1)).toEqual(p3)
  })

  it("lerp / clamp / distance", () => {
    expect(lerp(10, 20, 0.25)).toBe(12.5)
    expect(clamp(5, 10, 100)).toBe(10)
    expect(clamp(500, 10, 100)).toBe(100)
    expect(clamp(50, 10, 100)).toBe(50)
    expect(distanceBetween({ x: 0, y: 0 }, { x: 3, y: 4 })).toBe(5)
  })
})

describe("easeInOutCubic", () => {
  it("关键点取值", () => {
    expect(easeInOutCubic(0)).toBe(0)
    expect(easeInOutCubic(0.25)).toBe(0.0625)
    expect(easeInOutCubic(0.5)).toBe(0.5)
    expect(easeInOutCubic(0.75)).toBe(0.9375)
    expect(easeInOutCubic(1)).toBe(1)
  })

  it("单调不减", () => {
    let prev = -Infinity
    for (let i = 0; i <= 100; i++) {
      const v = easeInOutCubic(i / 100)
      expect(v).toBeGreaterThanOrEqual(prev)
      prev = v
    }
  })
})
