/* 中文注释：轨迹管线微基准（完整生成 / 骨架 / 校验） */
import { Bench } from "tinybench";
import { writeFile, mkdir } from "node:fs/promises";
import { DEFAULT_TRAJECTORY_CONFIG } from "../src/config/trajectoryConfig.js";
import { createLogger } from "../src/logging/createLogger.js";
import { mulberry32 } from "../src/trajectory/core/random.js";
import { TrajectoryGenerator } from "../src/trajectory/generator.js";
import { generateSkeleton } from "../src/trajectory/skeleton.js";
import { validateTrajectory } from "../src/trajectory/validator.js";

async function main() {
	const bench = new Bench({ time: 100, iterations: 100 });
	const logger = createLogger({ useSilent: true });
	const generator = new TrajectoryGenerator({ seed: 7, logger });
	const random = mulberry32(7);
	const plan = {
		start: { x: 0, y: 0 },
		end: { x: 800, y: 300 },
		distance: Math.hypot(800, 300),
		duration: 1.2,
		style: "bezier" as const,
	};

	bench.add("generate-283px", () => {
		generator.generate({ x: 100, y: 100 }, { x: 300, y: 300 });
	});

	bench.add("generate-854px-1s", () => {
		generator.generate({ x: 0, y: 0 }, { x: 800, y: 300 }, 1);
	});

	bench.add("skeleton-bezier", () => {
		generateSkeleton(plan, DEFAULT_TRAJECTORY_CONFIG, random, 0);
	});

	const skeleton = generateSkeleton(plan, DEFAULT_TRAJECTORY_CONFIG, random, 0);
	bench.add("validate-skeleton", () => {
		validateTrajectory(skeleton, DEFAULT_TRAJECTORY_CONFIG, random);
	});

	await bench.run();

	const results = bench.tasks.map((t) => ({
		name: t.name,
		hz: t.result?.hz,
		mean: t.result?.mean,
		min: t.result?.min,
		max: t.result?.max,
		variance: t.result?.variance,
		samples: t.result?.samples.length,
	}));

	await mkdir("artifacts", { recursive: true });
	const path = `artifacts/metrics-${Date.now()}.json`;
	await writeFile(path, JSON.stringify({ date: new Date().toISOString(), results }, null, 2), "utf-8");
	console.log(JSON.stringify({ ok: true, path }, null, 2));
}

main().catch((err) => {
	console.error(err);
	process.exit(1);
});
