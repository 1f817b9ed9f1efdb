/* 中文注释：轨迹配置 Schema（默认值、取值范围校验）与环境变量映射 */
import { z } from "zod";

const probability = z.number().min(0).max(1);
const positive = z.number().positive();

const orderedRange = z
	.tuple([positive, positive])
	.refine(([min, max]) => min <= max, { message: "区间下限不能大于上限" });

export const TrajectoryConfigSchema = z
	.object({
		baseNoiseAmplitude: z.number().min(0).default(2.0),
		directionChangeProbability: probability.default(0.15),
		microCorrectionProbability: probability.default(0.25),
		pauseProbability: probability.default(0.08),
		overshootProbability: probability.default(0.12),
		speedVariationRange: orderedRange.default([0.7, 1.4]),
		avgSpeedRange: orderedRange.default([150, 400]),
		maxAcceleration: positive.default(800),
		minTimeInterval: positive.default(0.008),
		maxTimeInterval: positive.default(0.025),
		bezierControlRange: z.number().min(0).default(0.3),
	})
	.refine((c) => c.minTimeInterval < c.maxTimeInterval, {
		message: "minTimeInterval 必须小于 maxTimeInterval",
		path: ["minTimeInterval"],
	});

export type TrajectoryConfig = Readonly<z.infer<typeof TrajectoryConfigSchema>>;
export type TrajectoryConfigInput = z.input<typeof TrajectoryConfigSchema>;

const optionalNumber = z
	.string()
	.optional()
	.transform((s) => (s === undefined || s.trim() === "" ? undefined : Number(s)));

const optionalRange = z
	.string()
	.optional()
	.transform((s): [number, number] | undefined => {
		if (s === undefined || s.trim() === "") return undefined;
		const [min, max, ...rest] = s.split(",");
		if (max === undefined || rest.length > 0) return [Number.NaN, Number.NaN];
		return [Number(min.trim()), Number(max.trim())];
	});

// TRAJ_* 环境变量 → 配置覆盖项（未设置的字段沿用默认值）
export const EnvSchema = z.object({
	TRAJ_NOISE_AMPLITUDE: optionalNumber,
	TRAJ_DIRECTION_CHANGE_PROBABILITY: optionalNumber,
	TRAJ_MICRO_CORRECTION_PROBABILITY: optionalNumber,
	TRAJ_PAUSE_PROBABILITY: optionalNumber,
	TRAJ_OVERSHOOT_PROBABILITY: optionalNumber,
	TRAJ_SPEED_VARIATION_RANGE: optionalRange,
	TRAJ_AVG_SPEED_RANGE: optionalRange,
	TRAJ_MAX_ACCELERATION: optionalNumber,
	TRAJ_MIN_TIME_INTERVAL: optionalNumber,
	TRAJ_MAX_TIME_INTERVAL: optionalNumber,
	TRAJ_BEZIER_CONTROL_RANGE: optionalNumber,
});

export type TrajectoryEnv = z.infer<typeof EnvSchema>;
