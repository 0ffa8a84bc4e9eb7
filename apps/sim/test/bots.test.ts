import {
	type Action,
	createGame,
	type GameState,
	listLegalActions,
	mulberry32,
} from "@service-grid/engine";
import { describe, expect, test } from "vitest";
import { makeRandomBot } from "../src/bots/randomBot";
import { makeStrategyBot } from "../src/bots/strategyBot";

const withService = (
	state: GameState,
	id: number,
	patch: Partial<GameState["services"][number]>,
): GameState => ({
	...state,
	services: state.services.map((s) => (s.id === id ? { ...s, ...patch } : s)),
});

const choose = async (
	bot: ReturnType<typeof makeStrategyBot>,
	state: GameState,
	rng: () => number,
	playerId = 0,
) =>
	bot.chooseAction({
		state,
		playerId,
		legalActions: listLegalActions(state, playerId),
		rng,
	});

const asKey = (action: Action | null) => JSON.stringify(action);

describe("randomBot", () => {
	test("picks one of the legal actions", async () => {
		const state = createGame();
		const legal = listLegalActions(state, 0);
		const action = await makeRandomBot().chooseAction({
			state,
			playerId: 0,
			legalActions: legal,
			rng: () => 0,
		});
		expect(action).toEqual(legal[0]);
	});

	test("passes when nothing is legal", async () => {
		const action = await makeRandomBot().chooseAction({
			state: createGame(),
			playerId: 0,
			legalActions: [],
			rng: () => 0.5,
		});
		expect(action).toBeNull();
	});
});

describe("strategyBot", () => {
	test("repairs an overloaded service first", async () => {
		const state = withService(createGame(), 1, {
			state: "overloaded",
			load: 12,
		});
		const action = await choose(makeStrategyBot("balanced"), state, () => 0);
		expect(action).toEqual({ type: "repair", serviceId: 1 });
	});

	test("a degraded but lightly loaded service is not urgent", async () => {
		const state = withService(createGame(), 1, { state: "degraded", load: 2 });
		const action = await choose(
			makeStrategyBot("aggressive"),
			state,
			mulberry32(4),
		);
		expect(action?.type).toBe("deploy");
	});

	test("always returns a legal action", async () => {
		for (const strategy of [
			"aggressive",
			"defensive",
			"balanced",
			"random",
		] as const) {
			const state = createGame({ seed: 9 });
			const legal = new Set(listLegalActions(state, 0).map(asKey));
			const action = await choose(
				makeStrategyBot(strategy),
				state,
				mulberry32(17),
			);
			expect(legal.has(asKey(action))).toBe(true);
		}
	});

	test("is deterministic for a given draw sequence", async () => {
		const state = createGame({ seed: 2 });
		const bot = makeStrategyBot("defensive");
		const a = await choose(bot, state, mulberry32(33));
		const b = await choose(bot, state, mulberry32(33));
		expect(a).toEqual(b);
	});

	test("passes when nothing is legal", async () => {
		const action = await makeStrategyBot("balanced").chooseAction({
			state: createGame(),
			playerId: 0,
			legalActions: [],
			rng: () => 0.5,
		});
		expect(action).toBeNull();
	});
});
