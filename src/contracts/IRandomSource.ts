/* 中文注释：随机源与时钟契约（可注入，便于确定性测试） */

/**
 * 随机源：返回 [0, 1) 区间的均匀分布浮点数。
 *
 * 默认使用 Math.random；测试中注入带种子的 mulberry32。
 */
export type RandomSource = () => number;

/**
 * 时钟：返回当前时间（秒）。每次顶层调用只读取一次。
 */
export type Clock = () => number;
