import { createGame, rollDice } from "@service-grid/engine";
import { describe, expect, test } from "vitest";
import { face, scripted } from "./helpers";

describe("dice", () => {
	test("rolls each die and sums them", () => {
		const state = createGame({ seed: 3 });
		const result = rollDice(
			state,
			"d6",
			3,
			scripted(face(1, 6), face(6, 6), face(3, 6)),
		);
		expect(result.rolls).toEqual([1, 6, 3]);
		expect(result.total).toBe(10);
	});

	test("records history with round and phase context", () => {
		const state = createGame({ seed: 3 });
		const { state: next } = rollDice(state, "d20", 1, scripted(face(17, 20)));
		expect(next.diceHistory).toEqual([
			{
				die: "d20",
				count: 1,
				rolls: [17],
				total: 17,
				round: 0,
				phase: "traffic",
			},
		]);
		expect(next.lastDiceRoll).toEqual(next.diceHistory[0]);
		expect(state.diceHistory).toHaveLength(0);
		expect(state.lastDiceRoll).toBeNull();
	});

	test("lastDiceRoll tracks the most recent roll", () => {
		const first = rollDice(createGame(), "d4", 1, scripted(face(2, 4)));
		const second = rollDice(first.state, "d12", 2, scripted(0, 0.99));
		expect(second.state.diceHistory).toHaveLength(2);
		expect(second.state.lastDiceRoll?.die).toBe("d12");
		expect(second.state.lastDiceRoll?.rolls).toEqual([1, 12]);
	});

	test("stays within [1, sides]", () => {
		let state = createGame({ seed: 11 });
		for (let i = 0; i < 50; i++) {
			const result = rollDice(state, "d4", 4);
			for (const r of result.rolls) {
				expect(r).toBeGreaterThanOrEqual(1);
				expect(r).toBeLessThanOrEqual(4);
			}
			state = result.state;
		}
	});

	test("the state's own generator is reproducible and advances", () => {
		const state = createGame({ seed: 42 });
		const a = rollDice(state, "d20", 5);
		const b = rollDice(state, "d20", 5);
		expect(a.rolls).toEqual(b.rolls);
		expect(a.state.rngState).not.toBe(state.rngState);
	});

	test("an injected source leaves rngState alone", () => {
		const state = createGame({ seed: 42 });
		const result = rollDice(state, "d8", 1, scripted(0.5));
		expect(result.state.rngState).toBe(state.rngState);
	});

	test("rejects unknown die kinds", () => {
		const state = createGame();
		expect(() => rollDice(state, JSON.parse('"d7"'), 1)).toThrow(
			"Unknown die kind: d7",
		);
	});

	test("rejects a non-positive count", () => {
		expect(() => rollDice(createGame(), "d6", 0)).toThrow(
			"Dice count must be a positive integer, got 0",
		);
	});
});
