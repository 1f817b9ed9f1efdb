import { ValidationError } from "../core/errors/ValidationError.js";
import { OUTPUT_FORMATS, type OutputFormat } from "../trajectory/export.js";
import type { Point2D } from "../trajectory/types.js";

/**
 * 解析通用参数
 *
 * 从命令行参数中提取 `--name=value` 形式的参数值。
 *
 * @param name 参数名（不含 -- 前缀）
 * @param argv 命令行参数数组
 * @param defaultValue 默认值（参数不存在时返回）
 *
 * @example
 * ```typescript
 * const format = parseArg('format', process.argv, 'table');
 * const out = parseArg('out', process.argv);
 * ```
 */
export function parseArg(name: string, argv: string[], defaultValue?: string): string | undefined {
	const prefix = `--${name}=`;
	const found = argv.find((a) => a.startsWith(prefix));
	return found ? found.slice(prefix.length) : defaultValue;
}

/**
 * 解析布尔标志（`--name`）
 */
export function parseFlag(name: string, argv: string[]): boolean {
	return argv.some((a) => a === `--${name}`);
}

/**
 * 解析坐标参数 `x,y`
 *
 * @throws ValidationError 缺失或不是两个有限数
 *
 * @example
 * ```typescript
 * parsePoint('100,200', 'from'); // => { x: 100, y: 200 }
 * ```
 */
export function parsePoint(raw: string | undefined, name: string): Point2D {
	if (raw === undefined) {
		throw new ValidationError(`缺少 --${name}=x,y 参数`, { field: name, value: raw, expected: "x,y" });
	}
	const parts = raw.split(",").map((s) => s.trim());
	const [x, y] = parts.map(Number);
	if (parts.length !== 2 || parts.some((s) => s === "") || !Number.isFinite(x) || !Number.isFinite(y)) {
		throw new ValidationError(`--${name} 坐标格式无效：${raw}`, { field: name, value: raw, expected: "x,y" });
	}
	return { x, y };
}

/**
 * 解析可选数值参数；未提供时返回 undefined
 *
 * @throws ValidationError 提供了但不是有限数
 */
export function parseOptionalNumber(raw: string | undefined, name: string): number | undefined {
	if (raw === undefined) return undefined;
	const value = Number(raw);
	if (raw.trim() === "" || !Number.isFinite(value)) {
		throw new ValidationError(`--${name} 必须为数值：${raw}`, { field: name, value: raw, expected: "number" });
	}
	return value;
}

function isOutputFormat(value: string): value is OutputFormat {
	return OUTPUT_FORMATS.some((f) => f === value);
}

/**
 * 解析输出格式（table、json、ndjson），默认 table
 */
export function parseFormat(raw: string | undefined): OutputFormat {
	const value = raw ?? "table";
	if (!isOutputFormat(value)) {
		throw new ValidationError(`--format 不支持：${value}`, {
			field: "format",
			value,
			expected: OUTPUT_FORMATS.join("|"),
		});
	}
	return value;
}
