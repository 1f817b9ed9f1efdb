/**
 * 基础错误抽象类
 *
 * 轨迹生成相关错误的基类，统一错误代码、可重试标记与上下文序列化。
 *
 * @example
 * ```typescript
 * class PlanError extends BaseError {
 *   readonly code = 'PLAN_ERROR';
 *   readonly retryable = false;
 * }
 *
 * throw new PlanError('无法规划轨迹', { distance: 0 });
 * ```
 */
export abstract class BaseError extends Error {
	/** 错误代码（唯一标识） */
	abstract readonly code: string;

	/** 是否可重试 */
	abstract readonly retryable: boolean;

	/**
	 * @param message 错误消息
	 * @param context 上下文信息（用于调试和日志）
	 */
	constructor(
		message: string,
		public readonly context?: Record<string, unknown>,
	) {
		super(message);
		this.name = this.constructor.name;
		Error.captureStackTrace?.(this, this.constructor);
	}

	/**
	 * 序列化为 JSON（便于日志记录）
	 */
	toJSON(): object {
		return {
			name: this.name,
			code: this.code,
			message: this.message,
			retryable: this.retryable,
			context: this.context,
			stack: this.stack,
		};
	}
}
