/* 中文注释：轨迹统一类型定义（点、规划结果、骨架样式） */
export interface Point2D { x: number; y: number }

// 轨迹点：速度/加速度为派生量，位置变化后需重新计算
export interface TrajectoryPoint {
  x: number;
  y: number;
  timestamp: number;      // 秒
  velocityX: number;
  velocityY: number;
  accelerationX: number;
  accelerationY: number;
  synthesized: boolean;   // 校验阶段为修补大间隔插入的点
}

export type Trajectory = TrajectoryPoint[];

export type SkeletonStyle = "bezier" | "arc" | "curvedDirect";

export interface TrajectoryPlan {
  start: Point2D;
  end: Point2D;
  distance: number;
  duration: number;       // 秒，已限制在 DURATION_RANGE 内
  style: SkeletonStyle;
}

export function createPoint(x: number, y: number, timestamp: number): TrajectoryPoint {
  return { x, y, timestamp, velocityX: 0, velocityY: 0, accelerationX: 0, accelerationY: 0, synthesized: false }
}
