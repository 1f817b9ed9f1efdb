/**
 * 日志模块：ILogger 契约的 pino 实现与工厂。
 *
 * @packageDocumentation
 */

export { PinoLogger } from "./PinoLogger.js";
export { createLogger } from "./createLogger.js";
