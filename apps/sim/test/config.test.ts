import { describe, expect, test } from "vitest";
import {
	BatchOptionsSchema,
	createBatchOptions,
	defaultBatchOptions,
} from "../src/simulation/config";

describe("createBatchOptions", () => {
	test("fills in defaults", () => {
		expect(createBatchOptions()).toEqual({
			games: 100,
			seed: 42,
			playerCount: 4,
			bots: ["strategy"],
			competitive: false,
			scenario: "standard",
		});
	});

	test("overrides individual fields", () => {
		const options = createBatchOptions({ games: 5, bots: ["random"] });
		expect(options.games).toBe(5);
		expect(options.bots).toEqual(["random"]);
		expect(options.seed).toBe(defaultBatchOptions.seed);
	});

	test("rejects invalid options with every problem listed", () => {
		expect(() => createBatchOptions({ games: 0 })).toThrow(
			"Invalid batch options: games: games must be a positive integer",
		);
		expect(() => createBatchOptions({ games: 0, playerCount: 5 })).toThrow(
			"Invalid batch options: games: games must be a positive integer; playerCount: playerCount must be at most 4",
		);
	});

	test("schema rejects unknown bot types", () => {
		const parsed = BatchOptionsSchema.safeParse({
			...defaultBatchOptions,
			bots: ["oracle"],
		});
		expect(parsed.success).toBe(false);
	});
});
