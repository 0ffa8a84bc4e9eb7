import {
	advanceRound,
	applyAction,
	calculateUptime,
	chaosEvent,
	createGame,
	exportSnapshot,
	getPlayer,
	getWinner,
	isGameOver,
	listLegalActions,
	mulberry32,
	resolveOverloads,
	runTrafficPhase,
	setPhase,
	TEAM_WINNER,
} from "@service-grid/engine";
import { log } from "./log";
import {
	createScenario,
	type ScenarioName,
} from "./scenarios/networkScenarios";
import type {
	Action,
	Bot,
	EngineEvent,
	GameConfigInput,
	GameLog,
	GameResult,
	GameState,
	PlayerId,
} from "./types";

/** Keeps bot draws off the engine's own stream. */
const BOT_STREAM_SALT = 0x9e3779b9;

export type PlayGameOptions = {
	seed: number;
	/** One bot per seat, in seat order */
	bots: Bot[];
	config?: GameConfigInput;
	scenario?: ScenarioName;
	record?: boolean;
	verbose?: boolean;
};

/**
 * Drives one game to completion: traffic, every seat's actions, resolution,
 * then chaos and the round close, until the engine reports game over.
 */
export async function playGame(opts: PlayGameOptions): Promise<GameResult> {
	if (opts.bots.length === 0) {
		throw new Error("playGame requires at least one bot.");
	}
	const rng = mulberry32((opts.seed ^ BOT_STREAM_SALT) >>> 0);
	const setup = {
		seed: opts.seed,
		playerCount: opts.bots.length,
		config: opts.config,
	};
	let state: GameState = opts.scenario
		? createScenario(opts.scenario, setup)
		: createGame(setup);

	const actions: GameLog["actions"] = [];
	const engineEvents: EngineEvent[] = opts.record ? [...state.eventLog] : [];
	let actionsTaken = 0;
	let rejectedActions = 0;

	const record = (events: EngineEvent[]) => {
		if (opts.record) engineEvents.push(...events);
	};

	while (!isGameOver(state)) {
		state = setPhase(state, "traffic");
		const traffic = runTrafficPhase(state);
		state = traffic.state;
		record(traffic.engineEvents);
		if (opts.verbose) {
			log("debug", "traffic", {
				round: state.round,
				requests: traffic.requests,
			});
		}

		state = setPhase(state, "action");
		for (const [seat, bot] of opts.bots.entries()) {
			const outcome = await takeTurn(state, seat, bot, rng);
			state = outcome.state;
			record(outcome.engineEvents);
			actionsTaken += outcome.accepted.length;
			if (outcome.rejected) rejectedActions++;
			for (const action of outcome.accepted) {
				actions.push({ round: state.round, playerId: seat, action });
			}
		}

		state = setPhase(state, "resolution");
		const resolution = resolveOverloads(state);
		state = resolution.state;
		record(resolution.engineEvents);

		state = setPhase(state, "chaos");
		const chaos = chaosEvent(state);
		state = chaos.state;
		record(chaos.engineEvents);

		const closed = advanceRound(state);
		state = closed.state;
		record(closed.engineEvents);
		if (opts.verbose) {
			log("debug", "round_end", {
				round: state.round,
				uptime: calculateUptime(state),
				entropy: state.entropy,
			});
		}
	}

	const winner = getWinner(state);
	const result: GameResult = {
		seed: opts.seed,
		rounds: state.round,
		winner,
		cooperativeSuccess: winner === TEAM_WINNER,
		finalUptime: calculateUptime(state),
		totalRequests: state.totalRequests,
		successfulRequests: state.successfulRequests,
		failedRequests: state.failedRequests,
		finalEntropy: state.entropy,
		actionsTaken,
		rejectedActions,
		players: state.players.map((p) => ({
			id: p.id,
			name: p.name,
			strategy: p.strategy,
			bot: opts.bots[p.id]?.name ?? "none",
			finalScore: p.score,
			servicesOwned: p.servicesOwned.length,
			finalResources: { cpu: p.cpu, memory: p.memory, storage: p.storage },
		})),
		log: opts.record
			? {
					seed: opts.seed,
					bots: opts.bots.map((b) => b.name),
					actions,
					engineEvents,
					finalState: exportSnapshot(state),
				}
			: undefined,
	};
	if (opts.verbose) {
		log("info", "game_complete", {
			seed: result.seed,
			rounds: result.rounds,
			winner: result.winner,
			uptime: result.finalUptime,
		});
	}
	return result;
}

type TurnOutcome = {
	state: GameState;
	accepted: Action[];
	rejected: boolean;
	engineEvents: EngineEvent[];
};

/** A rejected or missing choice forfeits the rest of the seat's budget. */
async function takeTurn(
	start: GameState,
	playerId: PlayerId,
	bot: Bot,
	rng: () => number,
): Promise<TurnOutcome> {
	let state = start;
	const accepted: Action[] = [];
	const engineEvents: EngineEvent[] = [];

	for (;;) {
		const player = getPlayer(state, playerId);
		if (!player || player.actionsRemaining <= 0) break;
		const legalActions = listLegalActions(state, playerId);
		if (legalActions.length === 0) break;

		const action = await bot.chooseAction({
			state,
			playerId,
			legalActions,
			rng,
		});
		if (!action) break;

		const result = applyAction(state, playerId, action);
		engineEvents.push(...result.engineEvents);
		if (!result.ok) {
			log("warn", "action_rejected", {
				playerId,
				bot: bot.name,
				reason: result.reason,
				error: result.error,
			});
			return { state, accepted, rejected: true, engineEvents };
		}
		state = result.state;
		accepted.push(action);
	}
	return { state, accepted, rejected: false, engineEvents };
}
