import { z } from "zod";
import { beginStep, type StepContext } from "./context";
import type { RandomSource } from "./rng";
import type { DiceRoll, DieKind, EngineEvent, GameState } from "./types";

export const DIE_SIDES: Readonly<Record<DieKind, number>> = {
	d4: 4,
	d6: 6,
	d8: 8,
	d10: 10,
	d12: 12,
	d20: 20,
};

export const DieKindSchema = z.enum(["d4", "d6", "d8", "d10", "d12", "d20"]);

export type RollResult = {
	state: GameState;
	rolls: number[];
	total: number;
	engineEvents: EngineEvent[];
};

// Unknown kinds are rejected rather than silently rolled as a d6.
export function rollIn(ctx: StepContext, die: DieKind, count = 1): DiceRoll {
	const kind = DieKindSchema.safeParse(die);
	if (!kind.success) {
		throw new Error(`Unknown die kind: ${String(die)}`);
	}
	if (!Number.isInteger(count) || count < 1) {
		throw new Error(`Dice count must be a positive integer, got ${count}`);
	}
	const sides = DIE_SIDES[kind.data];
	const rolls: number[] = [];
	for (let i = 0; i < count; i++) {
		rolls.push(Math.min(sides, 1 + Math.floor(ctx.random() * sides)));
	}
	const record: DiceRoll = {
		die: kind.data,
		count,
		rolls,
		total: rolls.reduce((a, b) => a + b, 0),
		round: ctx.state.round,
		phase: ctx.state.phase,
	};
	ctx.state.diceHistory.push(record);
	ctx.state.lastDiceRoll = record;
	return record;
}

export function rollDice(
	state: GameState,
	die: DieKind,
	count = 1,
	random?: RandomSource,
): RollResult {
	const ctx = beginStep(state, random);
	const record = rollIn(ctx, die, count);
	return {
		state: ctx.state,
		rolls: record.rolls,
		total: record.total,
		engineEvents: ctx.events,
	};
}
