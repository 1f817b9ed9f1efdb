import type { Logger } from "pino";
import type { ILogger } from "../contracts/ILogger.js";

/**
 * Pino 日志记录器实现
 *
 * 封装 pino 实例，实现 ILogger 接口；error 级别会展开 Error 对象的堆栈。
 *
 * @example
 * ```typescript
 * const logger = new PinoLogger(pino());
 * logger.info({ points: 87 }, '轨迹生成完成');
 * ```
 */
export class PinoLogger implements ILogger {
	constructor(private pino: Logger) {}

	debug(obj: Record<string, unknown> | string, msg?: string): void {
		if (typeof obj === "string") {
			this.pino.debug(obj);
		} else {
			this.pino.debug({ ...obj }, msg);
		}
	}

	info(obj: Record<string, unknown> | string, msg?: string): void {
		if (typeof obj === "string") {
			this.pino.info(obj);
		} else {
			this.pino.info({ ...obj }, msg);
		}
	}

	warn(obj: Record<string, unknown> | string, msg?: string): void {
		if (typeof obj === "string") {
			this.pino.warn(obj);
		} else {
			this.pino.warn({ ...obj }, msg);
		}
	}

	/**
	 * 错误级别日志（err / error 字段为 Error 时提取 name、message、stack）
	 */
	error(obj: Record<string, unknown> | string, msg?: string): void {
		if (typeof obj === "string") {
			this.pino.error(obj);
			return;
		}
		const sanitized: Record<string, unknown> = { ...obj };
		const err = obj.err instanceof Error ? obj.err : obj.error instanceof Error ? obj.error : undefined;
		if (err) {
			sanitized.err = {
				name: err.name,
				message: err.message,
				stack: err.stack,
			};
		}
		this.pino.error(sanitized, msg);
	}

	child(bindings: Record<string, unknown>): ILogger {
		return new PinoLogger(this.pino.child(bindings));
	}
}
