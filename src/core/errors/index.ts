/**
 * 错误体系
 *
 * - BaseError: 抽象基类（code、retryable、context、toJSON）
 *   - ValidationError: 输入/配置验证错误（不可重试）
 *
 * @packageDocumentation
 */

export { BaseError } from "./BaseError.js";
export { ValidationError } from "./ValidationError.js";
