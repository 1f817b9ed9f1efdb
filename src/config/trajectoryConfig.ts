/* 中文注释：轨迹配置构造（默认值 + 覆盖项校验，返回冻结对象） */
import { ValidationError } from "../core/errors/ValidationError.js";
import { TrajectoryConfigSchema, type TrajectoryConfig, type TrajectoryConfigInput } from "./schema.js";

/**
 * 创建不可变的轨迹配置
 *
 * @param overrides 需要覆盖的字段，其余字段取默认值
 * @throws ValidationError 覆盖项越界（概率不在 [0,1]、区间倒置、最小间隔不小于最大间隔等）
 *
 * @example
 * ```typescript
 * const config = createTrajectoryConfig({ overshootProbability: 0 });
 * ```
 */
export function createTrajectoryConfig(overrides: TrajectoryConfigInput = {}): TrajectoryConfig {
	const parsed = TrajectoryConfigSchema.safeParse(overrides);
	if (!parsed.success) {
		const issues = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`);
		throw new ValidationError(`轨迹配置无效：${issues.join("; ")}`, {
			field: "config",
			value: overrides,
			issues,
		});
	}
	const config = parsed.data;
	Object.freeze(config.speedVariationRange);
	Object.freeze(config.avgSpeedRange);
	return Object.freeze(config);
}

export const DEFAULT_TRAJECTORY_CONFIG: TrajectoryConfig = createTrajectoryConfig();
