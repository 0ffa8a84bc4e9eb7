import {
	type Action,
	capacityOf,
	costOf,
	type GameState,
	getService,
	pickOne,
	type PlayerId,
	type PlayerStrategy,
	SERVICE_CATALOG,
	type ServiceKind,
} from "@service-grid/engine";
import type { Bot } from "../types";

type StrategyWeights = {
	deploy: number;
	repair: number;
	scale: number;
	/** Fraction of ~30 total resources to keep in reserve */
	conservativeThreshold: number;
	preferences: Record<ServiceKind, number>;
};

type ScoredStrategy = Exclude<PlayerStrategy, "random">;

const EVEN_PREFERENCES: Record<ServiceKind, number> = {
	compute: 1,
	database: 1,
	cache: 1,
	queue: 1,
	load_balancer: 1,
	api_gateway: 1,
};

export const STRATEGY_WEIGHTS: Readonly<
	Record<ScoredStrategy, StrategyWeights>
> = {
	aggressive: {
		deploy: 0.5,
		repair: 0.1,
		scale: 0.2,
		conservativeThreshold: 0.2,
		preferences: {
			load_balancer: 2.0,
			api_gateway: 1.8,
			compute: 1.5,
			cache: 1.2,
			queue: 1.0,
			database: 0.8,
		},
	},
	defensive: {
		deploy: 0.2,
		repair: 0.4,
		scale: 0.3,
		conservativeThreshold: 0.7,
		preferences: {
			database: 2.0,
			cache: 1.8,
			queue: 1.5,
			compute: 1.2,
			load_balancer: 1.0,
			api_gateway: 0.8,
		},
	},
	balanced: {
		deploy: 0.35,
		repair: 0.25,
		scale: 0.15,
		conservativeThreshold: 0.4,
		preferences: EVEN_PREFERENCES,
	},
};

const URGENT_REPAIR_CHANCE = 0.8;
const URGENT_LOAD_RATIO = 1.5;
const TOP_CHOICES = 3;
const SCORE_NOISE = 0.1;
const RESERVE_SCALE = 30;

type ScoringContext = {
	state: GameState;
	playerId: PlayerId;
	strategy: ScoredStrategy;
	weights: StrategyWeights;
	rng: () => number;
};

/**
 * Heuristic player: repairs urgent services first, otherwise scores every
 * legal action by its strategy's weights and draws among the best three.
 */
export function makeStrategyBot(strategy: PlayerStrategy): Bot {
	return {
		name: `StrategyBot(${strategy})`,
		chooseAction: ({ state, playerId, legalActions, rng }) => {
			if (legalActions.length === 0) return null;

			const urgent = urgentRepairs(state, legalActions);
			if (urgent.length > 0 && rng() < URGENT_REPAIR_CHANCE) {
				return pickOne(urgent, rng);
			}

			if (strategy === "random") return pickOne(legalActions, rng);

			const ctx: ScoringContext = {
				state,
				playerId,
				strategy,
				weights: STRATEGY_WEIGHTS[strategy],
				rng,
			};
			const top = legalActions
				.map((action) => ({ action, score: scoreAction(action, ctx) }))
				.sort((a, b) => b.score - a.score)
				.slice(0, TOP_CHOICES);
			return weightedPick(top, rng);
		},
	};
}

function urgentRepairs(state: GameState, legalActions: Action[]): Action[] {
	return legalActions.filter((action) => {
		if (action.type !== "repair") return false;
		const service = getService(state, action.serviceId);
		if (!service) return false;
		return (
			service.state === "overloaded" ||
			service.load > capacityOf(service) * URGENT_LOAD_RATIO
		);
	});
}

function weightedPick(
	options: Array<{ action: Action; score: number }>,
	rng: () => number,
): Action | null {
	const total = options.reduce((sum, o) => sum + Math.max(0, o.score), 0);
	if (total <= 0) return options[0]?.action ?? null;
	let roll = rng() * total;
	for (const option of options) {
		roll -= Math.max(0, option.score);
		if (roll < 0) return option.action;
	}
	return options[options.length - 1]?.action ?? null;
}

function scoreAction(action: Action, ctx: ScoringContext): number {
	const noise = (ctx.rng() * 2 - 1) * SCORE_NOISE;
	switch (action.type) {
		case "deploy":
			return scoreDeploy(action, ctx) * ctx.weights.deploy + noise;
		case "repair":
			return scoreRepair(action.serviceId, ctx) * ctx.weights.repair + noise;
		case "scale":
			return scoreScale(action.serviceId, ctx) * ctx.weights.scale + noise;
	}
}

function scoreDeploy(
	action: Extract<Action, { type: "deploy" }>,
	ctx: ScoringContext,
): number {
	const { state, playerId, weights } = ctx;
	const kind = action.serviceType;
	const cost = costOf(kind);
	const totalCost = cost.cpu + cost.memory + cost.storage;

	let score = weights.preferences[kind];
	score += (SERVICE_CATALOG[kind].capacity / totalCost) * 0.5;
	score += scorePosition(action.position, ctx);
	score += nearbyServices(state, action.position) * 0.3;

	if (kind === "load_balancer") {
		const owned = state.services.filter(
			(s) => s.kind === "load_balancer" && s.owner === playerId,
		).length;
		if (owned === 0) score += 2;
		else if (owned < 2) score += 1;
	}

	const player = state.players.find((p) => p.id === playerId);
	if (player) {
		const remaining = player.cpu + player.memory + player.storage - totalCost;
		if (remaining < weights.conservativeThreshold * RESERVE_SCALE) {
			score *= 0.5;
		}
	}
	return score;
}

function scoreRepair(serviceId: number, { state }: ScoringContext): number {
	const service = getService(state, serviceId);
	if (!service) return 0;
	const capacity = capacityOf(service);
	let score = 1;
	if (service.state === "overloaded") score += 2;
	else if (service.state === "degraded") score += 1;
	if (service.kind === "load_balancer" || service.kind === "database") {
		score += 1.5;
	}
	if (service.connections.length > 3) score += 1;
	if (service.load > capacity) score += (service.load - capacity) * 0.1;
	return score;
}

function scoreScale(serviceId: number, { state }: ScoringContext): number {
	const service = getService(state, serviceId);
	if (!service) return 0;
	const ratio = service.load / capacityOf(service);
	let score = 0.5;
	if (ratio > 0.8) score += 2;
	else if (ratio > 0.6) score += 1;
	if (service.kind === "cache" || service.kind === "queue") score += 0.5;
	return score;
}

function manhattan(a: readonly [number, number], b: readonly [number, number]) {
	return Math.abs(a[0] - b[0]) + Math.abs(a[1] - b[1]);
}

function scorePosition(
	position: readonly [number, number],
	{ state, playerId, strategy }: ScoringContext,
): number {
	const centerRow = Math.floor(state.config.boardRows / 2);
	const centerCol = Math.floor(state.config.boardCols / 2);
	const maxDistance = Math.max(1, centerRow + centerCol);
	let score =
		(1 - manhattan(position, [centerRow, centerCol]) / maxDistance) * 0.5;

	// aggressive players push toward rivals, defensive ones huddle
	const targets =
		strategy === "aggressive"
			? state.services.filter((s) => s.owner !== playerId)
			: strategy === "defensive"
				? state.services.filter((s) => s.owner === playerId)
				: [];
	if (targets.length > 0) {
		const closest = Math.min(
			...targets.map((s) => manhattan(position, s.position)),
		);
		score += 1 / (closest + 1);
	}
	return score;
}

/** Occupied cells in the 5x5 square around `position`. */
function nearbyServices(
	state: GameState,
	[row, col]: readonly [number, number],
): number {
	const { boardRows, boardCols } = state.config;
	let count = 0;
	for (let r = Math.max(0, row - 2); r < Math.min(boardRows, row + 3); r++) {
		for (let c = Math.max(0, col - 2); c < Math.min(boardCols, col + 3); c++) {
			if (state.board[r * boardCols + c] != null) count++;
		}
	}
	return count;
}
