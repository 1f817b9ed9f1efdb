import { BaseError } from "./BaseError.js";

/**
 * 验证错误
 *
 * 调用方违反输入契约时抛出：坐标非有限数、时长非正、配置越界等。
 * 不可重试（需要修正输入）。
 *
 * @example
 * ```typescript
 * throw new ValidationError('时长必须为正数', {
 *   field: 'duration',
 *   value: -1,
 *   expected: 'finite number > 0'
 * });
 * ```
 */
export class ValidationError extends BaseError {
	readonly code = "VALIDATION_ERROR";
	readonly retryable = false;

	/**
	 * @param message 错误消息
	 * @param context 上下文信息（field、value、expected 等）
	 */
	constructor(message: string, context?: Record<string, unknown>) {
		super(message, context);
	}

	/**
	 * 验证失败的字段名
	 */
	get field(): string | undefined {
		const field = this.context?.field;
		return typeof field === "string" ? field : undefined;
	}

	/**
	 * 实际值
	 */
	get value(): unknown {
		return this.context?.value;
	}

	/**
	 * 期望值或格式
	 */
	get expected(): string | undefined {
		const expected = this.context?.expected;
		return typeof expected === "string" ? expected : undefined;
	}
}
