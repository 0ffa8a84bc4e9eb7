import { writeFileSync } from "node:fs";
import minimist from "minimist";
import { z } from "zod";
import { log, setLogLevel } from "./log";
import { playGame } from "./match";
import { gameConfigFor, makeSeatBots, runBatch } from "./runner/batchRunner";
import {
	SCENARIO_NAMES,
	ScenarioNameSchema,
} from "./scenarios/networkScenarios";
import {
	type BatchOptions,
	BotTypeSchema,
	createBatchOptions,
} from "./simulation/config";

type Args = ReturnType<typeof minimist>;

type CliContext = {
	options: BatchOptions;
	verbose: boolean;
	json: boolean;
	logFile?: string;
};

const BotListSchema = z
	.string()
	.transform((raw) => raw.split(",").map((s) => s.trim()))
	.pipe(z.array(BotTypeSchema).min(1));

function stringArg(argv: Args, ...keys: string[]): string | undefined {
	for (const key of keys) {
		const value = argv[key];
		if (typeof value === "string") {
			return value;
		}
	}
	return undefined;
}

function num(v: unknown, def: number) {
	const n =
		typeof v === "string" ? Number(v) : typeof v === "number" ? v : Number.NaN;
	return Number.isFinite(n) ? n : def;
}

function createCliContext(argv: Args): CliContext {
	const maxRounds =
		argv.rounds === undefined ? undefined : num(argv.rounds, Number.NaN);
	const botsArg = stringArg(argv, "bots");
	const options = createBatchOptions({
		games: num(argv.games, 100),
		seed: num(argv.seed, 1),
		playerCount: num(argv.players, 4),
		...(botsArg === undefined ? {} : { bots: BotListSchema.parse(botsArg) }),
		maxRounds,
		competitive: !!argv.competitive,
		scenario: ScenarioNameSchema.parse(
			stringArg(argv, "scenario") ?? "standard",
		),
		outputDir: stringArg(argv, "output"),
	});
	return {
		options,
		verbose: !!argv.verbose,
		json: !!argv.json,
		logFile: stringArg(argv, "logFile"),
	};
}

async function handleSingleCommand(context: CliContext): Promise<void> {
	const { options } = context;
	const result = await playGame({
		seed: options.seed,
		bots: makeSeatBots(options.bots, options.playerCount),
		config: gameConfigFor(options),
		scenario: options.scenario,
		record: !!context.logFile,
		verbose: context.verbose,
	});

	if (context.logFile && result.log) {
		writeFileSync(context.logFile, JSON.stringify(result.log));
	}
	// the full log only goes to --logFile
	console.log(JSON.stringify({ ...result, log: undefined }, null, 2));
}

async function handleBatchCommand(context: CliContext): Promise<void> {
	const { options } = context;
	if (!context.json) {
		log("info", "batch_start", {
			games: options.games,
			seed: options.seed,
			scenario: options.scenario,
		});
	}

	const startTime = Date.now();
	const { stats } = await runBatch(options, (completed, total) => {
		if (context.verbose && completed % 10 === 0) {
			log("debug", "batch_progress", { completed, total });
		}
	});
	const duration = (Date.now() - startTime) / 1000;

	if (context.json) {
		console.log(JSON.stringify(stats, null, 2));
		return;
	}
	log("info", "batch_complete", {
		durationSeconds: Number(duration.toFixed(1)),
		games: stats.totalGames,
		cooperativeSuccessRate: stats.cooperativeSuccessRate,
		meanUptime: stats.uptime.mean,
		meanRounds: stats.rounds.mean,
	});
}

function printUsageAndExit(): never {
	console.error("Usage:");
	console.error("  tsx src/cli.ts single --seed 1 --verbose --logFile ./game.json");
	console.error(
		"  tsx src/cli.ts batch  --games 100 --seed 1 --output ./results --json",
	);
	console.error("");
	console.error("Game options:");
	console.error("  --players N      Seats, 1-4 (default: 4)");
	console.error("  --rounds N       Round limit (default: 10)");
	console.error("  --competitive    Score-based winner instead of team success");
	console.error(`  --scenario NAME  One of: ${SCENARIO_NAMES.join(", ")}`);
	console.error(
		"  --bots LIST      Comma-separated seat bots: strategy, random (default: strategy)",
	);
	process.exit(1);
}

async function main() {
	const argv: Args = minimist(process.argv.slice(2), {
		boolean: ["competitive", "verbose", "json"],
		string: ["bots", "scenario", "output", "logFile"],
	});
	const cmd = argv._[0];
	const context = createCliContext(argv);
	setLogLevel(context.verbose ? "debug" : context.json ? "warn" : "info");

	switch (cmd) {
		case "single":
			await handleSingleCommand(context);
			return;
		case "batch":
			await handleBatchCommand(context);
			return;
		default:
			printUsageAndExit();
	}
}

main().catch((e) => {
	console.error(e);
	process.exit(1);
});
