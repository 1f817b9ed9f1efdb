/* 中文注释：测试用随机源（常量 / 固定序列） */
import type { RandomSource } from "../../src/contracts/IRandomSource.js"

export function constantRandom(value: number): RandomSource {
  return () => value
}

// 依次返回给定序列，耗尽后循环
export function sequenceRandom(values: number[]): RandomSource {
  let i = 0
  return () => {
    const v = values[i % values.length]
    i++
    return v
  }
}
