/**
 * 日志记录器接口
 *
 * 轨迹管线只依赖该契约；测试可注入静默实现或 vi.fn() 替身。
 *
 * @example
 * ```typescript
 * const logger: ILogger = createLogger();
 * logger.debug({ style: 'arc', steps: 42 }, '骨架生成完成');
 *
 * const stageLogger = logger.child({ module: 'trajectory' });
 * stageLogger.info('开始生成');
 * ```
 */
export interface ILogger {
	debug(obj: Record<string, unknown>, msg?: string): void;
	debug(msg: string): void;

	info(obj: Record<string, unknown>, msg?: string): void;
	info(msg: string): void;

	warn(obj: Record<string, unknown>, msg?: string): void;
	warn(msg: string): void;

	/**
	 * 错误级别日志
	 * @param obj 结构化数据（包含 Error 对象时自动提取堆栈）
	 */
	error(obj: Record<string, unknown>, msg?: string): void;
	error(msg: string): void;

	/**
	 * 创建子日志记录器（绑定上下文）
	 */
	child(bindings: Record<string, unknown>): ILogger;
}
