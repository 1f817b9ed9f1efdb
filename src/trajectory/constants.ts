/* 中文注释：管线中的显式限幅常量 */

// 未指定时长时的推导结果、以及调用方给定时长的有效区间（秒）
export const DURATION_RANGE = [0.2, 3.0] as const

// 骨架分段数 N 的区间（实际点数为 N + 1）
export const STEP_COUNT_RANGE = [10, 100] as const

// 任意输出轨迹的点数上限（含过冲点与插值点）
export const MAX_TRAJECTORY_POINTS = 130

// 低于该距离（像素）直接走两点短轨迹
export const SHORT_DISTANCE_THRESHOLD = 5

// 相邻点时间间隔超过 maxTimeInterval 的该倍数时插值修补
export const GAP_REPAIR_FACTOR = 3
