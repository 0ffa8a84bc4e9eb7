import { type GameState, TEAM_WINNER, type Winner } from "./types";

const RECENT_UPTIME_WINDOW = 3;

function mean(values: readonly number[]): number {
	return values.reduce((a, b) => a + b, 0) / values.length;
}

/** successful / total, 1 before any request has been processed */
export function calculateUptime(
	state: Pick<GameState, "totalRequests" | "successfulRequests">,
): number {
	if (state.totalRequests === 0) return 1;
	return Math.min(1, state.successfulRequests / state.totalRequests);
}

export function isGameOver(state: GameState): boolean {
	if (state.round >= state.config.maxRounds) return true;

	if (
		state.config.cooperativeMode &&
		state.uptimeHistory.length >= RECENT_UPTIME_WINDOW &&
		mean(state.uptimeHistory.slice(-RECENT_UPTIME_WINDOW)) >=
			state.config.uptimeTarget
	) {
		return true;
	}

	return state.players.every((p) => p.servicesOwned.length === 0);
}

/**
 * Cooperative games are won by the whole team or nobody. Competitive ties go
 * to the first player in seat order.
 */
export function getWinner(state: GameState): Winner {
	if (state.config.cooperativeMode) {
		if (state.uptimeHistory.length === 0) return null;
		return mean(state.uptimeHistory) >= state.config.uptimeTarget
			? TEAM_WINNER
			: null;
	}

	let best: GameState["players"][number] | undefined;
	for (const player of state.players) {
		if (!best || player.score > best.score) best = player;
	}
	return best ? best.id : null;
}
