import * as fs from "node:fs";
import * as path from "node:path";
import { makeRandomBot } from "../bots/randomBot";
import { makeStrategyBot } from "../bots/strategyBot";
import { log } from "../log";
import { playGame } from "../match";
import type {
	BatchOptions,
	BatchStats,
	BotType,
	RangeStats,
} from "../simulation/config";
import type { Bot, GameConfigInput, GameResult, PlayerStrategy } from "../types";

const SEAT_STRATEGIES: readonly PlayerStrategy[] = [
	"aggressive",
	"defensive",
	"balanced",
	"random",
];

/** Strategy bots follow the seat's engine strategy; the last type repeats. */
export function makeSeatBots(types: BotType[], playerCount: number): Bot[] {
	const bots: Bot[] = [];
	for (let seat = 0; seat < playerCount; seat++) {
		const type = types[Math.min(seat, types.length - 1)] ?? "strategy";
		const strategy = SEAT_STRATEGIES[seat % SEAT_STRATEGIES.length] ?? "random";
		bots.push(type === "random" ? makeRandomBot() : makeStrategyBot(strategy));
	}
	return bots;
}

export function gameConfigFor(options: BatchOptions): GameConfigInput {
	return {
		cooperativeMode: !options.competitive,
		...(options.maxRounds !== undefined ? { maxRounds: options.maxRounds } : {}),
	};
}

function rangeOf(values: number[]): RangeStats {
	if (values.length === 0) return { min: 0, max: 0, mean: 0 };
	return {
		min: Math.min(...values),
		max: Math.max(...values),
		mean: values.reduce((a, b) => a + b, 0) / values.length,
	};
}

export function aggregateResults(
	results: GameResult[],
	playerCount: number,
): BatchStats {
	const wins: Record<string, number> = {};
	for (let id = 0; id < playerCount; id++) wins[String(id)] = 0;

	let cooperativeSuccesses = 0;
	let noWinner = 0;
	let totalActions = 0;
	let totalRejectedActions = 0;
	const scoresByStrategy = new Map<string, number[]>();

	for (const result of results) {
		if (result.cooperativeSuccess) {
			cooperativeSuccesses++;
		} else if (result.winner === null) {
			noWinner++;
		} else {
			const key = String(result.winner);
			wins[key] = (wins[key] ?? 0) + 1;
		}
		totalActions += result.actionsTaken;
		totalRejectedActions += result.rejectedActions;
		for (const player of result.players) {
			const scores = scoresByStrategy.get(player.strategy) ?? [];
			scores.push(player.finalScore);
			scoresByStrategy.set(player.strategy, scores);
		}
	}

	const rounds = results.map((r) => r.rounds).sort((a, b) => a - b);
	const strategyScores: Record<string, RangeStats> = {};
	for (const [strategy, scores] of scoresByStrategy) {
		strategyScores[strategy] = rangeOf(scores);
	}

	return {
		totalGames: results.length,
		completedGames: results.length,
		cooperativeSuccesses,
		cooperativeSuccessRate:
			results.length > 0 ? cooperativeSuccesses / results.length : 0,
		noWinner,
		wins,
		uptime: rangeOf(results.map((r) => r.finalUptime)),
		rounds: {
			...rangeOf(rounds),
			median: rounds[Math.floor(rounds.length / 2)] ?? 0,
		},
		meanFinalEntropy: rangeOf(results.map((r) => r.finalEntropy)).mean,
		totalActions,
		totalRejectedActions,
		strategyScores,
	};
}

/**
 * Runs `options.games` games over consecutive seeds and aggregates them.
 * Writes summary.json and results.json when an output directory is set.
 */
export async function runBatch(
	options: BatchOptions,
	onProgress?: (completed: number, total: number) => void,
): Promise<{ results: GameResult[]; stats: BatchStats }> {
	const bots = makeSeatBots(options.bots, options.playerCount);
	const config = gameConfigFor(options);
	const results: GameResult[] = [];

	for (let i = 0; i < options.games; i++) {
		results.push(
			await playGame({
				seed: options.seed + i,
				bots,
				config,
				scenario: options.scenario,
			}),
		);
		onProgress?.(i + 1, options.games);
	}

	const stats = aggregateResults(results, options.playerCount);
	if (options.outputDir) {
		fs.mkdirSync(options.outputDir, { recursive: true });
		fs.writeFileSync(
			path.join(options.outputDir, "summary.json"),
			JSON.stringify(stats, null, 2),
		);
		fs.writeFileSync(
			path.join(options.outputDir, "results.json"),
			JSON.stringify(results, null, 2),
		);
		log("info", "batch_written", { outputDir: options.outputDir });
	}
	return { results, stats };
}
