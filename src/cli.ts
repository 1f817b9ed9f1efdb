#!/usr/bin/env node
/* 中文注释：轨迹生成 CLI（--from=x,y --to=x,y [--duration=s] [--seed=n] [--format=table|json|ndjson] [--out=file]） */
import { writeFile } from "node:fs/promises";
import { ConfigProvider } from "./config/ConfigProvider.js";
import { createLogger } from "./logging/createLogger.js";
import { renderTrajectory, summarizeTrajectory, toPointRecords } from "./trajectory/export.js";
import { TrajectoryGenerator } from "./trajectory/generator.js";
import { parseArg, parseFlag, parseFormat, parseOptionalNumber, parsePoint } from "./utils/cliParser.js";

// 轨迹数据写 stdout，日志走 stderr
const logger = createLogger({ toStderr: true });

const USAGE = "用法: trajectory --from=x,y --to=x,y [--duration=秒] [--seed=整数] [--format=table|json|ndjson] [--out=文件]";

async function main(argv: string[]): Promise<void> {
	if (parseFlag("help", argv)) {
		process.stdout.write(USAGE + "\n");
		return;
	}

	const provider = ConfigProvider.load();
	const from = parsePoint(parseArg("from", argv), "from");
	const to = parsePoint(parseArg("to", argv), "to");
	const duration = parseOptionalNumber(parseArg("duration", argv), "duration");
	const seed = parseOptionalNumber(parseArg("seed", argv), "seed");
	const format = parseFormat(parseArg("format", argv));
	const out = parseArg("out", argv);

	const generator = new TrajectoryGenerator({ config: provider.trajectory, seed, logger });
	const points = generator.generate(from, to, duration);
	const summary = summarizeTrajectory(points, from, to);
	const output = renderTrajectory(format, summary, toPointRecords(points));

	if (out) {
		await writeFile(out, output, "utf-8");
		logger.info({ out, format, ...summary }, "轨迹已写入文件");
	} else {
		process.stdout.write(output);
	}
}

main(process.argv.slice(2)).catch((err: unknown) => {
	logger.error({ err }, "CLI 执行失败");
	process.stderr.write(USAGE + "\n");
	process.exitCode = 1;
});
