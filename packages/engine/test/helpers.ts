import {
	cloneState,
	type GameState,
	type PlayerId,
	type PlayerState,
	type Position,
	placeService,
	type RandomSource,
	type Service,
	type ServiceId,
	type ServiceKind,
} from "@service-grid/engine";

/** Replays fixed draws; throws when the engine asks for more than scripted. */
export const scripted = (...values: number[]): RandomSource => {
	let i = 0;
	return () => {
		const value = values[i];
		if (value === undefined) {
			throw new Error(`scripted random exhausted after ${i} draws`);
		}
		i += 1;
		return value;
	};
};

/** The draw that makes a die of `sides` land on `face`. */
export const face = (value: number, sides: number): number =>
	(value - 0.5) / sides;

export const patchService = (
	state: GameState,
	id: ServiceId,
	patch: Partial<Omit<Service, "id">>,
): GameState => ({
	...state,
	services: state.services.map((s) => (s.id === id ? { ...s, ...patch } : s)),
});

export const patchPlayer = (
	state: GameState,
	id: number,
	patch: Partial<Omit<PlayerState, "id">>,
): GameState => ({
	...state,
	players: state.players.map((p) => (p.id === id ? { ...p, ...patch } : p)),
});

export const serviceById = (state: GameState, id: ServiceId): Service => {
	const service = state.services.find((s) => s.id === id);
	if (!service) throw new Error(`service ${id} missing`);
	return service;
};

export const playerById = (state: GameState, id: number): PlayerState => {
	const player = state.players.find((p) => p.id === id);
	if (!player) throw new Error(`player ${id} missing`);
	return player;
};

/** Places services for free, in order; throws if a placement is refused. */
export const withServices = (
	state: GameState,
	placements: ReadonlyArray<[ServiceKind, Position, PlayerId?]>,
): GameState => {
	const next = cloneState(state);
	for (const [kind, position, owner] of placements) {
		const placed = placeService(next, kind, position, owner ?? 0);
		if (!placed.ok) {
			throw new Error(`cannot place ${kind} at ${position}: ${placed.reason}`);
		}
	}
	return next;
};
