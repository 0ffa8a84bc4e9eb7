import type { GameState } from "./types";

export type RandomSource = () => number;

const MULBERRY_INCREMENT = 0x6d2b79f5;

function mulberryOutput(t: number): number {
	let x = t;
	x = Math.imul(x ^ (x >>> 15), x | 1);
	x ^= x + Math.imul(x ^ (x >>> 7), x | 61);
	return ((x ^ (x >>> 14)) >>> 0) / 4294967296;
}

export function mulberry32(seed: number): RandomSource {
	let t = seed >>> 0;
	return function () {
		t = (t + MULBERRY_INCREMENT) >>> 0;
		return mulberryOutput(t);
	};
}

/**
 * Draws from the generator whose counter lives on the state, advancing
 * `rngState` in place. Only ever called on a cloned state.
 */
export function stateRandom(state: GameState): RandomSource {
	return function () {
		state.rngState = (state.rngState + MULBERRY_INCREMENT) >>> 0;
		return mulberryOutput(state.rngState);
	};
}

export function pickOne<T>(arr: readonly T[], rng: RandomSource): T {
	const idx = Math.floor(rng() * arr.length);
	const item = arr[Math.min(idx, arr.length - 1)];
	if (item === undefined) throw new Error("pickOne called with empty array");
	return item;
}

/** Partial Fisher-Yates; order of the result follows the draws. */
export function sampleWithoutReplacement<T>(
	arr: readonly T[],
	count: number,
	rng: RandomSource,
): T[] {
	const pool = [...arr];
	const picked: T[] = [];
	const n = Math.min(count, pool.length);
	for (let i = 0; i < n; i++) {
		const idx = Math.min(
			i + Math.floor(rng() * (pool.length - i)),
			pool.length - 1,
		);
		const item = pool[idx];
		const head = pool[i];
		if (item === undefined || head === undefined) break;
		pool[idx] = head;
		pool[i] = item;
		picked.push(item);
	}
	return picked;
}
