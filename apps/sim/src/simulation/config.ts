import { z } from "zod";
import { ScenarioNameSchema } from "../scenarios/networkScenarios";

export const BotTypeSchema = z.enum(["strategy", "random"]);
export type BotType = z.infer<typeof BotTypeSchema>;

/** Configuration for a batch of simulated games */
export interface BatchOptions {
	/** Number of games to run */
	games: number;
	/** Seed of the first game; game i uses seed + i */
	seed: number;
	/** Seats per game */
	playerCount: number;
	/** Bot driving each seat; the last entry repeats for extra seats */
	bots: BotType[];
	/** Round limit override */
	maxRounds?: number;
	/** Score-based winner instead of team success */
	competitive: boolean;
	scenario: z.infer<typeof ScenarioNameSchema>;
	/** Directory for summary.json and results.json, when set */
	outputDir?: string;
}

/** Min / max / mean of a per-game measurement */
export interface RangeStats {
	min: number;
	max: number;
	mean: number;
}

/** Aggregate statistics across all games */
export interface BatchStats {
	totalGames: number;
	completedGames: number;
	cooperativeSuccesses: number;
	cooperativeSuccessRate: number;
	noWinner: number;
	/** Competitive wins keyed by player id */
	wins: Record<string, number>;
	uptime: RangeStats;
	rounds: RangeStats & { median: number };
	meanFinalEntropy: number;
	totalActions: number;
	totalRejectedActions: number;
	strategyScores: Record<string, RangeStats>;
}

/** Schema for validating batch options */
export const BatchOptionsSchema = z.object({
	games: z.number().int().positive("games must be a positive integer"),
	seed: z.number().int("seed must be an integer"),
	playerCount: z
		.number()
		.int()
		.min(1, "playerCount must be at least 1")
		.max(4, "playerCount must be at most 4"),
	bots: z.array(BotTypeSchema).min(1, "at least one bot type is required"),
	maxRounds: z.number().int().positive("maxRounds must be positive").optional(),
	competitive: z.boolean(),
	scenario: ScenarioNameSchema,
	outputDir: z.string().min(1, "outputDir cannot be empty").optional(),
});

/** Default configuration values */
export const defaultBatchOptions: BatchOptions = {
	games: 100,
	seed: 42,
	playerCount: 4,
	bots: ["strategy"],
	competitive: false,
	scenario: "standard",
};

/**
 * Creates full BatchOptions from partial options, applying defaults
 */
export function createBatchOptions(
	options: Partial<BatchOptions> = {},
): BatchOptions {
	const merged = { ...defaultBatchOptions, ...options };
	const result = BatchOptionsSchema.safeParse(merged);
	if (!result.success) {
		const errors = result.error.errors
			.map((e) => `${e.path.join(".")}: ${e.message}`)
			.join("; ");
		throw new Error(`Invalid batch options: ${errors}`);
	}
	return result.data;
}
