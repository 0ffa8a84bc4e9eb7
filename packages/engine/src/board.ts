import type {
	GameConfig,
	GameState,
	PlayerId,
	Position,
	Service,
	ServiceId,
	ServiceKind,
} from "./types";

export type PlaceResult =
	| { ok: true; service: Service }
	| { ok: false; reason: "out_of_bounds" | "position_occupied" };

// odd-r offset, pointy-top
const EVEN_ROW_DELTAS: ReadonlyArray<readonly [number, number]> = [
	[-1, -1],
	[-1, 0],
	[0, -1],
	[0, 1],
	[1, -1],
	[1, 0],
];
const ODD_ROW_DELTAS: ReadonlyArray<readonly [number, number]> = [
	[-1, 0],
	[-1, 1],
	[0, -1],
	[0, 1],
	[1, 0],
	[1, 1],
];

export function inBounds(
	config: Pick<GameConfig, "boardRows" | "boardCols">,
	[row, col]: Position,
): boolean {
	return (
		Number.isInteger(row) &&
		Number.isInteger(col) &&
		row >= 0 &&
		row < config.boardRows &&
		col >= 0 &&
		col < config.boardCols
	);
}

export function neighborsOf(
	[row, col]: Position,
	rows: number,
	cols: number,
): Position[] {
	const deltas = row % 2 === 0 ? EVEN_ROW_DELTAS : ODD_ROW_DELTAS;
	const result: Position[] = [];
	for (const [dr, dc] of deltas) {
		const nr = row + dr;
		const nc = col + dc;
		if (nr >= 0 && nr < rows && nc >= 0 && nc < cols) {
			result.push([nr, nc]);
		}
	}
	return result;
}

function cellIndex(state: GameState, [row, col]: Position): number {
	return row * state.config.boardCols + col;
}

export function serviceIdAt(
	state: GameState,
	position: Position,
): ServiceId | null {
	if (!inBounds(state.config, position)) return null;
	return state.board[cellIndex(state, position)] ?? null;
}

export function getService(
	state: GameState,
	id: ServiceId,
): Service | undefined {
	return state.services.find((s) => s.id === id);
}

export function serviceAt(
	state: GameState,
	position: Position,
): Service | undefined {
	const id = serviceIdAt(state, position);
	return id === null ? undefined : getService(state, id);
}

export function isOccupied(state: GameState, position: Position): boolean {
	return serviceIdAt(state, position) !== null;
}

function addConnection(service: Service, other: ServiceId) {
	if (service.connections.includes(other)) return;
	service.connections.push(other);
	service.connections.sort((a, b) => a - b);
}

/** Symmetric edge removal. */
export function disconnect(state: GameState, a: ServiceId, b: ServiceId) {
	const first = getService(state, a);
	const second = getService(state, b);
	if (first) first.connections = first.connections.filter((id) => id !== b);
	if (second) second.connections = second.connections.filter((id) => id !== a);
}

function autoConnect(state: GameState, service: Service) {
	const { boardRows, boardCols } = state.config;
	for (const pos of neighborsOf(service.position, boardRows, boardCols)) {
		const neighbor = serviceAt(state, pos);
		if (!neighbor) continue;
		addConnection(service, neighbor.id);
		addConnection(neighbor, service.id);
	}
}

/**
 * Places a new service on a cloned state. Resources are the caller's
 * concern; this only touches the board, the owner's set and connectivity.
 */
export function placeService(
	state: GameState,
	kind: ServiceKind,
	position: Position,
	owner: PlayerId,
): PlaceResult {
	if (!inBounds(state.config, position)) {
		return { ok: false, reason: "out_of_bounds" };
	}
	if (isOccupied(state, position)) {
		return { ok: false, reason: "position_occupied" };
	}

	const service: Service = {
		id: state.nextServiceId,
		kind,
		position: [position[0], position[1]],
		state: "healthy",
		load: 0,
		bugs: 0,
		connections: [],
		owner,
	};
	state.nextServiceId += 1;
	state.services.push(service);
	state.board[cellIndex(state, position)] = service.id;
	state.players.find((p) => p.id === owner)?.servicesOwned.push(service.id);

	autoConnect(state, service);
	return { ok: true, service };
}
