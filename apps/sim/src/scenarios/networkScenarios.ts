import {
	cloneState,
	createGame,
	type GameConfigInput,
	type GameState,
	isOccupied,
	neighborsOf,
	placeService,
	type ServiceKind,
	setEntropy,
} from "@service-grid/engine";
import { z } from "zod";

export const ScenarioNameSchema = z.enum([
	"standard",
	"busy",
	"degraded",
	"late_game",
]);

export type ScenarioName = z.infer<typeof ScenarioNameSchema>;

export const SCENARIO_NAMES = ScenarioNameSchema.options;

/** Free services each player starts with around its load balancer. */
const BUSY_BACKLINE: readonly ServiceKind[] = ["compute", "cache"];
const BUSY_ENTRY_LOAD = 8;
const DEGRADED_ENTRY_LOAD = 7;

/**
 * Creates a game already positioned at an interesting point, so drivers and
 * tests can skip the opening rounds.
 */
export function createScenario(
	name: ScenarioName,
	options: { seed?: number; playerCount?: number; config?: GameConfigInput } = {},
): GameState {
	const base = createGame(options);

	switch (name) {
		case "standard":
			return base;

		case "busy": {
			// Each player has a small backline and traffic already queued
			const state = cloneState(base);
			const { boardRows, boardCols } = state.config;
			for (const entry of base.services) {
				const free = neighborsOf(entry.position, boardRows, boardCols).filter(
					(pos) => !isOccupied(state, pos),
				);
				BUSY_BACKLINE.forEach((kind, i) => {
					const position = free[i];
					if (position) placeService(state, kind, position, entry.owner);
				});
			}
			for (const service of state.services) {
				if (service.kind === "load_balancer") service.load = BUSY_ENTRY_LOAD;
			}
			return state;
		}

		case "degraded": {
			// Every entry point needs a repair and chaos is primed
			const state = cloneState(base);
			for (const service of state.services) {
				service.state = "degraded";
				service.load = DEGRADED_ENTRY_LOAD;
			}
			return setEntropy(state, state.config.chaosThreshold);
		}

		case "late_game": {
			const state = cloneState(base);
			state.round = Math.max(0, state.config.maxRounds - 2);
			state.uptimeHistory = [0.7, 0.75];
			return setEntropy(state, state.config.maxEntropy - 2);
		}
	}
}
