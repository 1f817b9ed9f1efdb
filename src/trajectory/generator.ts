import type { Clock, RandomSource } from "../contracts/IRandomSource.js"
import type { ILogger } from "../contracts/ILogger.js"
import type { TrajectoryConfig, TrajectoryConfigInput } from "../config/schema.js"
import { createTrajectoryConfig, DEFAULT_TRAJECTORY_CONFIG } from "../config/trajectoryConfig.js"
import { createLogger } from "../logging/createLogger.js"
import { injectHumanCharacteristics } from "./characteristics.js"
import { defaultRandom, mulberry32 } from "./core/random.js"
import { generateShortTrajectory } from "./fallback.js"
import { planTrajectory } from "./planner.js"
import { generateSkeleton } from "./skeleton.js"
import { applySmoothingAndNoise } from "./smoothing.js"
import type { Point2D, Trajectory } from "./types.js"
import { validateTrajectory } from "./validator.js"

export interface TrajectoryGeneratorOptions {
  /** 覆盖项或完整配置，构造时经 schema 校验并冻结 */
  config?: TrajectoryConfigInput
  /** 随机源；与 seed 同时给出时优先使用 random */
  random?: RandomSource
  /** 种子，生成 mulberry32 随机源 */
  seed?: number
  /** 时钟（秒），默认 Date.now() / 1000 */
  clock?: Clock
  /** 日志记录器；未提供时静默 */
  logger?: ILogger
}

export const systemClock: Clock = () => Date.now() / 1000

/**
 * 拟人化轨迹生成器
 *
 * 管线：规划 → 骨架 → 人性化特征 → 平滑噪声 → 校验重采样。每次调用构造新的轨迹，
 * 不保留任何跨调用状态（随机源本身除外）。
 *
 * @example
 * ```typescript
 * const generator = new TrajectoryGenerator({ seed: 42 });
 * const points = generator.generate({ x: 100, y: 100 }, { x: 300, y: 300 });
 * for (const p of points) {
 *   console.log(p.x.toFixed(1), p.y.toFixed(1), p.timestamp.toFixed(3));
 * }
 * ```
 */
export class TrajectoryGenerator {
  readonly config: TrajectoryConfig
  private readonly random: RandomSource
  private readonly clock: Clock
  private readonly logger: ILogger

  constructor(options: TrajectoryGeneratorOptions = {}) {
    this.config = options.config === undefined ? DEFAULT_TRAJECTORY_CONFIG : createTrajectoryConfig(options.config)
    this.random = options.random ?? (options.seed === undefined ? defaultRandom : mulberry32(options.seed))
    this.clock = options.clock ?? systemClock
    this.logger = (options.logger ?? createLogger({ useSilent: true })).child({ module: "trajectory" })
  }

  /**
   * @param duration 期望时长（秒），省略时按距离推导
   * @throws ValidationError 坐标非有限数，或时长非正/非有限
   */
  generate(start: Point2D, end: Point2D, duration?: number): Trajectory {
    const plan = planTrajectory(start, end, duration, this.config, this.random)
    const now = this.clock()

    if (plan.kind === "short") {
      this.logger.debug({ distance: plan.distance }, "距离过短，生成两点轨迹")
      return generateShortTrajectory(plan.start, plan.end, this.random, now)
    }

    const skeleton = generateSkeleton(plan, this.config, this.random, now)
    const human = injectHumanCharacteristics(skeleton, this.config, this.random)
    const noisy = applySmoothingAndNoise(human, this.config, this.random)
    const { points, stats } = validateTrajectory(noisy, this.config, this.random)

    this.logger.debug(
      {
        style: plan.style,
        distance: plan.distance,
        duration: plan.duration,
        skeletonPoints: skeleton.length,
        humanPoints: human.length,
        points: points.length,
        ...stats,
      },
      "轨迹生成完成",
    )
    return points
  }
}

/**
 * 函数式入口：每次调用构造一个生成器
 */
export function generateTrajectory(start: Point2D, end: Point2D, options: TrajectoryGeneratorOptions & { duration?: number } = {}): Trajectory {
  return new TrajectoryGenerator(options).generate(start, end, options.duration)
}
