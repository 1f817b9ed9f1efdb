/* 中文注释：缓动函数（时间重映射，不改变几何形状） */
export type EasingFunction = (t: number) => number

export const easeInOutCubic: EasingFunction = (t) => (t < 0.5 ? 4 * t * t * t : 1 - Math.pow(-2 * t + 2, 3) / 2)
