import { placeService } from "./board";
import { capacityOf } from "./catalog";
import { beginStep, emit } from "./context";
import { GameConfigSchema, type GameSnapshot } from "./schema";
import { calculateUptime } from "./status";
import type {
	GameConfig,
	GameConfigInput,
	GameState,
	PlayerId,
	PlayerState,
	PlayerStrategy,
	Position,
} from "./types";

export const DEFAULT_CONFIG: GameConfig = {
	boardRows: 8,
	boardCols: 6,
	maxRounds: 10,
	uptimeTarget: 0.8,
	maxEntropy: 10,
	chaosThreshold: 3,
	cooperativeMode: true,
	actionsPerRound: 3,
	startingResources: 20,
	resourceCap: 50,
};

const STRATEGY_ROTATION: readonly PlayerStrategy[] = [
	"aggressive",
	"defensive",
	"balanced",
	"random",
];

export function resolveConfig(input?: GameConfigInput): GameConfig {
	if (!input) return DEFAULT_CONFIG;
	return GameConfigSchema.parse({ ...DEFAULT_CONFIG, ...input });
}

/** One starting load balancer per player, in seat order, up to four. */
export function startingPositions(config: GameConfig): Position[] {
	const lastRow = config.boardRows - 2;
	const lastCol = config.boardCols - 2;
	return [
		[1, 1],
		[1, lastCol],
		[lastRow, 1],
		[lastRow, lastCol],
	];
}

export type CreateGameOptions = {
	config?: GameConfigInput;
	playerCount?: number;
	seed?: number;
};

export function createGame(options: CreateGameOptions = {}): GameState {
	const config = resolveConfig(options.config);
	const playerCount = options.playerCount ?? 4;
	if (!Number.isInteger(playerCount) || playerCount < 1) {
		throw new Error(
			`playerCount must be a positive integer, got ${playerCount}`,
		);
	}
	const seed = options.seed ?? 0;

	const players: PlayerState[] = [];
	for (let i = 0; i < playerCount; i++) {
		players.push({
			id: i,
			name: `Player_${i}`,
			strategy:
				STRATEGY_ROTATION[i % STRATEGY_ROTATION.length] ?? "balanced",
			cpu: config.startingResources,
			memory: config.startingResources,
			storage: config.startingResources,
			score: 0,
			servicesOwned: [],
			actionsRemaining: config.actionsPerRound,
		});
	}

	const blank: GameState = {
		seed,
		rngState: seed >>> 0,
		config,
		round: 0,
		phase: "traffic",
		entropy: 0,
		players,
		services: [],
		board: Array.from(
			{ length: config.boardRows * config.boardCols },
			() => null,
		),
		nextServiceId: 1,
		totalRequests: 0,
		successfulRequests: 0,
		failedRequests: 0,
		uptimeHistory: [],
		eventLog: [],
		diceHistory: [],
		lastDiceRoll: null,
	};

	const ctx = beginStep(blank);
	const positions = startingPositions(config);
	for (const player of ctx.state.players) {
		const position = positions[player.id];
		if (!position) break;
		const placed = placeService(
			ctx.state,
			"load_balancer",
			position,
			player.id,
		);
		if (!placed.ok) continue;
		emit(ctx, {
			type: "initial_placement",
			playerId: player.id,
			serviceId: placed.service.id,
			serviceType: placed.service.kind,
			position: placed.service.position,
		});
	}
	return ctx.state;
}

export function getPlayer(
	state: GameState,
	playerId: PlayerId,
): PlayerState | undefined {
	return state.players.find((p) => p.id === playerId);
}

/** Drivers and scenarios seed instability directly; clamped to the range. */
export function setEntropy(state: GameState, entropy: number): GameState {
	const clamped = Math.max(
		0,
		Math.min(state.config.maxEntropy, Math.trunc(entropy)),
	);
	if (clamped === state.entropy) return state;
	return { ...state, entropy: clamped };
}

/** Full serializable view for UIs, APIs and telemetry. */
export function exportSnapshot(state: GameState): GameSnapshot {
	return {
		round: state.round,
		phase: state.phase,
		entropy: state.entropy,
		uptime: calculateUptime(state),
		players: state.players.map((p) => ({
			id: p.id,
			name: p.name,
			strategy: p.strategy,
			cpu: p.cpu,
			memory: p.memory,
			storage: p.storage,
			score: p.score,
			actionsRemaining: p.actionsRemaining,
			servicesOwned: [...p.servicesOwned],
		})),
		services: state.services.map((s) => ({
			id: s.id,
			type: s.kind,
			position: [s.position[0], s.position[1]],
			state: s.state,
			load: s.load,
			capacity: capacityOf(s),
			bugs: s.bugs,
			connections: [...s.connections],
			owner: s.owner,
		})),
		totalRequests: state.totalRequests,
		successfulRequests: state.successfulRequests,
		failedRequests: state.failedRequests,
		uptimeHistory: [...state.uptimeHistory],
	};
}
