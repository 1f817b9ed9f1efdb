/* 中文注释：轨迹导出：概要统计、逐点记录（NDJSON / 定宽文本表），供回放或外部绘图使用 */
import { distanceBetween } from "./core/curves.js"
import { magnitude } from "./core/kinematics.js"
import type { Point2D, Trajectory } from "./types.js"

export interface TrajectorySummary {
  pointCount: number
  distance: number       // 起终点直线距离（像素）
  totalTime: number      // 首末点时间差（秒）
  averageSpeed: number   // distance / totalTime，totalTime 为 0 时取 0
}

export interface PointRecord {
  index: number
  x: number
  y: number
  time: number           // 相对首点的时间偏移（秒）
  speed: number          // 首点为 0
  acceleration: number   // 前两个点为 0
  synthesized: boolean
}

export function summarizeTrajectory(points: Trajectory, start: Point2D, end: Point2D): TrajectorySummary {
  const distance = distanceBetween(start, end)
  const totalTime = points.length > 1 ? points[points.length - 1].timestamp - points[0].timestamp : 0
  return {
    pointCount: points.length,
    distance,
    totalTime,
    averageSpeed: totalTime > 0 ? distance / totalTime : 0,
  }
}

export function toPointRecords(points: Trajectory): PointRecord[] {
  if (points.length === 0) return []
  const origin = points[0].timestamp
  return points.map((p, i) => ({
    index: i,
    x: p.x,
    y: p.y,
    time: p.timestamp - origin,
    speed: i > 0 ? magnitude(p.velocityX, p.velocityY) : 0,
    acceleration: i > 1 ? magnitude(p.accelerationX, p.accelerationY) : 0,
    synthesized: p.synthesized,
  }))
}

export function toNdjson(records: readonly PointRecord[]): string {
  return records.map((r) => JSON.stringify(r) + "\n").join("")
}

const TABLE_HEADER = ["#", "X", "Y", "t(s)", "speed(px/s)", "accel(px/s²)"] as const
const TABLE_WIDTHS = [5, 8, 8, 8, 15, 15] as const

export function formatTable(records: readonly PointRecord[]): string {
  const row = (cells: readonly string[]) => cells.map((c, i) => c.padStart(TABLE_WIDTHS[i] ?? c.length)).join(" | ")
  const lines = [row(TABLE_HEADER), "-".repeat(75)]
  for (const r of records) {
    lines.push(row([
      String(r.index + 1),
      r.x.toFixed(2),
      r.y.toFixed(2),
      r.time.toFixed(3),
      r.speed.toFixed(2),
      r.acceleration.toFixed(2),
    ]))
  }
  return lines.join("\n")
}

export type OutputFormat = "table" | "json" | "ndjson"

export const OUTPUT_FORMATS: readonly OutputFormat[] = ["table", "json", "ndjson"]

export function formatSummary(summary: TrajectorySummary): string {
  return [
    `轨迹点数: ${summary.pointCount}`,
    `移动距离: ${summary.distance.toFixed(1)}px`,
    `总时长: ${summary.totalTime.toFixed(3)}s`,
    `平均速度: ${summary.averageSpeed.toFixed(1)}px/s`,
  ].join("\n")
}

export function renderTrajectory(format: OutputFormat, summary: TrajectorySummary, records: readonly PointRecord[]): string {
  switch (format) {
    case "json":
      return JSON.stringify({ summary, points: records }, null, 2) + "\n"
    case "ndjson":
      return toNdjson(records)
    case "table":
      return `${formatSummary(summary)}\n\n${formatTable(records)}\n`
  }
}
