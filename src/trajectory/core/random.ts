/* 中文注释：可注入随机源与常用分布（均匀/正态/伯努利/加权选择） */
import type { RandomSource } from "../../contracts/IRandomSource.js"

export const defaultRandom: RandomSource = Math.random

// mulberry32：32 位状态的种子 PRNG，同一种子产生同一序列
export function mulberry32(seed: number): RandomSource {
  let t = seed >>> 0
  return () => {
    t = (t + 0x6d2b79f5) >>> 0
    let x = t
    x = Math.imul(x ^ (x >>> 15), x | 1)
    x ^= x + Math.imul(x ^ (x >>> 7), x | 61)
    return ((x ^ (x >>> 14)) >>> 0) / 4294967296
  }
}

export function uniform(random: RandomSource, min: number, max: number): number {
  return min + random() * (max - min)
}

export function gaussian(random: RandomSource, mean = 0, stdDev = 1): number {
  // Box-Muller，u1 取 0 时 log 发散
  let u1 = 0
  while (u1 === 0) u1 = random()
  const u2 = random()
  const z0 = Math.sqrt(-2 * Math.log(u1)) * Math.cos(2 * Math.PI * u2)
  return mean + z0 * stdDev
}

export function chance(random: RandomSource, probability: number): boolean {
  return random() < probability
}

export interface Weighted<T> { value: T; weight: number }

export function weightedChoice<T>(random: RandomSource, options: readonly Weighted<T>[]): T {
  if (options.length === 0) throw new RangeError("weightedChoice 需要至少一个选项")
  const total = options.reduce((sum, o) => sum + o.weight, 0)
  let r = random() * total
  for (const option of options) {
    r -= option.weight
    if (r < 0) return option.value
  }
  return options[options.length - 1].value
}
