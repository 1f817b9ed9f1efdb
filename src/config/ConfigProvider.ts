import "dotenv/config";
import { ValidationError } from "../core/errors/ValidationError.js";
import { createTrajectoryConfig } from "./trajectoryConfig.js";
import { EnvSchema, type TrajectoryConfig, type TrajectoryConfigInput } from "./schema.js";

/**
 * 配置提供者
 *
 * 从环境变量（含项目根目录 .env）读取 TRAJ_* 覆盖项，经 Zod 校验后生成轨迹配置。
 *
 * @example
 * ```typescript
 * const provider = ConfigProvider.load();
 * const generator = new TrajectoryGenerator({ config: provider.trajectory });
 * ```
 */
export class ConfigProvider {
	private constructor(private config: TrajectoryConfig) {}

	/**
	 * 加载配置
	 *
	 * @param env 环境变量来源，默认 process.env
	 * @throws ValidationError 环境变量无法解析或越界
	 */
	static load(env: NodeJS.ProcessEnv = process.env): ConfigProvider {
		const parsed = EnvSchema.safeParse(env);
		if (!parsed.success) {
			const msg = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
			throw new ValidationError(`配置错误：${msg}。请检查 .env 或系统环境变量中的 TRAJ_* 设置。`);
		}
		const e = parsed.data;
		const overrides: TrajectoryConfigInput = {
			baseNoiseAmplitude: e.TRAJ_NOISE_AMPLITUDE,
			directionChangeProbability: e.TRAJ_DIRECTION_CHANGE_PROBABILITY,
			microCorrectionProbability: e.TRAJ_MICRO_CORRECTION_PROBABILITY,
			pauseProbability: e.TRAJ_PAUSE_PROBABILITY,
			overshootProbability: e.TRAJ_OVERSHOOT_PROBABILITY,
			speedVariationRange: e.TRAJ_SPEED_VARIATION_RANGE,
			avgSpeedRange: e.TRAJ_AVG_SPEED_RANGE,
			maxAcceleration: e.TRAJ_MAX_ACCELERATION,
			minTimeInterval: e.TRAJ_MIN_TIME_INTERVAL,
			maxTimeInterval: e.TRAJ_MAX_TIME_INTERVAL,
			bezierControlRange: e.TRAJ_BEZIER_CONTROL_RANGE,
		};
		return new ConfigProvider(createTrajectoryConfig(overrides));
	}

	/**
	 * 轨迹配置（冻结对象）
	 */
	get trajectory(): TrajectoryConfig {
		return this.config;
	}
}
