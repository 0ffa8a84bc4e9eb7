import { type RandomSource, stateRandom } from "./rng";
import type { EngineEvent, GameState, StepResult } from "./types";

type DistributiveOmit<T, K extends PropertyKey> = T extends unknown
	? Omit<T, K>
	: never;

/** An event before the engine stamps it with round and phase. */
export type EventPayload = DistributiveOmit<EngineEvent, "round" | "phase">;

/**
 * Mutable working set for a single engine step. `state` is always a clone of
 * the caller's state, so helpers below may mutate it freely.
 */
export type StepContext = {
	state: GameState;
	random: RandomSource;
	events: EngineEvent[];
};

export function cloneState(state: GameState): GameState {
	return {
		...state,
		config: { ...state.config },
		players: state.players.map((p) => ({
			...p,
			servicesOwned: [...p.servicesOwned],
		})),
		services: state.services.map((s) => ({
			...s,
			position: [s.position[0], s.position[1]],
			connections: [...s.connections],
		})),
		board: [...state.board],
		uptimeHistory: [...state.uptimeHistory],
		eventLog: [...state.eventLog],
		diceHistory: [...state.diceHistory],
	};
}

export function beginStep(
	state: GameState,
	random?: RandomSource,
): StepContext {
	const next = cloneState(state);
	return { state: next, random: random ?? stateRandom(next), events: [] };
}

export function finishStep(ctx: StepContext): StepResult {
	return { state: ctx.state, engineEvents: ctx.events };
}

export function stamp(state: GameState, payload: EventPayload): EngineEvent {
	return { ...payload, round: state.round, phase: state.phase };
}

/** Appends to the state's log and to the step's returned events. */
export function emit(ctx: StepContext, payload: EventPayload): void {
	const event = stamp(ctx.state, payload);
	ctx.state.eventLog.push(event);
	ctx.events.push(event);
}
