import pino from "pino";
import { PinoLogger } from "./PinoLogger.js";
import type { ILogger } from "../contracts/ILogger.js";

/**
 * 创建日志记录器
 *
 * @remarks
 * 环境变量：
 * - LOG_LEVEL: 日志级别（debug、info、warn、error），默认 info
 * - LOG_PRETTY: 是否使用 pino-pretty 格式（true/false），默认 false
 * - LOG_STDERR: 非 pretty 模式下输出到 stderr（true/false），默认 false；
 *   CLI 以 stdout 输出轨迹数据时应开启，避免日志混入数据流
 *
 * @param options.useSilent - 完全禁用日志（测试、嵌入调用方）
 * @param options.toStderr - 非 pretty 模式下将输出重定向至 stderr（fd=2）
 *
 * @example
 * ```typescript
 * const logger = createLogger();
 * logger.info('生成器就绪');
 *
 * const quiet = createLogger({ useSilent: true });
 * ```
 */
export function createLogger(options?: { useSilent?: boolean; toStderr?: boolean }): ILogger {
	if (options?.useSilent) {
		return new PinoLogger(pino({ level: "silent" }));
	}

	const pretty = process.env.LOG_PRETTY === "true";
	const level = process.env.LOG_LEVEL || "info";
	const toStderr = options?.toStderr === true || process.env.LOG_STDERR === "true";

	// pretty transport 自带输出目标，toStderr 仅在非 pretty 模式生效
	if (toStderr && !pretty) {
		return new PinoLogger(pino({ level }, pino.destination(2)));
	}

	const pinoInstance = pino({
		level,
		transport: pretty
			? {
					target: "pino-pretty",
					options: { colorize: true, translateTime: "SYS:standard", destination: toStderr ? 2 : 1 },
			  }
			: undefined,
	});

	return new PinoLogger(pinoInstance);
}
