import {
	CHAOS_TABLE,
	chaosEvent,
	createGame,
	setEntropy,
} from "@service-grid/engine";
import { describe, expect, test } from "vitest";
import { face, scripted, serviceById, withServices } from "./helpers";

const unstable = (entropy = 3) => setEntropy(createGame(), entropy);

describe("chaosEvent", () => {
	test("nothing happens below the threshold", () => {
		const state = unstable(2);
		const result = chaosEvent(state, scripted());
		expect(result.state).toBe(state);
		expect(result.engineEvents).toEqual([]);
	});

	test("does nothing once the game is over", () => {
		const state = { ...unstable(5), round: 10 };
		expect(chaosEvent(state, scripted()).state).toBe(state);
	});

	test("a DDoS loads every entry point and raises entropy by the roll", () => {
		const result = chaosEvent(unstable(), scripted(face(3, 8)));
		expect(result.state.services.map((s) => s.load)).toEqual([3, 3, 3, 3]);
		expect(result.state.entropy).toBe(6);
		expect(result.state.lastDiceRoll).toMatchObject({ die: "d8", rolls: [3] });
		expect(result.engineEvents).toEqual([
			{
				type: "chaos_event",
				round: 0,
				phase: "traffic",
				kind: "ddos_attack",
				description: "DDoS attack increases all load",
				roll: 3,
				entropyBefore: 3,
				entropyAfter: 6,
			},
		]);
	});

	test("a DDoS also hits gateways but spares other services", () => {
		const state = setEntropy(
			withServices(createGame({ playerCount: 1 }), [
				["api_gateway", [1, 2]],
				["compute", [2, 1]],
			]),
			3,
		);
		const result = chaosEvent(state, scripted(face(3, 8)));
		expect(result.state.services.map((s) => s.load)).toEqual([3, 3, 0]);
	});

	test("entropy is capped at the maximum", () => {
		const result = chaosEvent(unstable(9), scripted(face(3, 8)));
		expect(result.state.entropy).toBe(10);
		expect(result.engineEvents[0]).toMatchObject({
			entropyBefore: 9,
			entropyAfter: 10,
		});
	});

	test("a memory leak degrades one healthy service", () => {
		const result = chaosEvent(unstable(), scripted(face(2, 8), 0.6));
		expect(serviceById(result.state, 3)).toMatchObject({
			state: "degraded",
			load: 2,
		});
		expect(
			result.state.services.filter((s) => s.state === "healthy"),
		).toHaveLength(3);
		expect(result.state.entropy).toBe(5);
	});

	test("a memory leak with nothing healthy has no victim", () => {
		let state = unstable();
		state = {
			...state,
			services: state.services.map((s) => ({ ...s, state: "failed" as const })),
		};
		const result = chaosEvent(state, scripted(face(2, 8)));
		expect(result.state.services.every((s) => s.load === 0)).toBe(true);
	});

	test("a full disk overloads every database", () => {
		const state = setEntropy(
			withServices(createGame(), [["database", [3, 3]]]),
			3,
		);
		const result = chaosEvent(state, scripted(face(5, 8)));
		expect(serviceById(result.state, 5)).toMatchObject({
			state: "overloaded",
			load: 5,
		});
		expect(serviceById(result.state, 1)).toMatchObject({
			state: "healthy",
			load: 0,
		});
	});

	test("a network partition cuts random links", () => {
		const state = setEntropy(
			withServices(createGame({ playerCount: 1 }), [["compute", [1, 2]]]),
			3,
		);
		// two attempts: LB 1 drops its link to 2, then compute 2 has none left
		const result = chaosEvent(state, scripted(face(6, 8), 0.1, 0.0, 0.9));
		expect(serviceById(result.state, 1).connections).toEqual([]);
		expect(serviceById(result.state, 2).connections).toEqual([]);
		expect(serviceById(state, 1).connections).toEqual([2]);
	});

	test("a datacenter outage fails two live services", () => {
		const result = chaosEvent(unstable(), scripted(face(8, 8), 0, 0));
		expect(result.state.services.map((s) => s.state)).toEqual([
			"failed",
			"failed",
			"healthy",
			"healthy",
		]);
		expect(result.engineEvents.map((e) => e.type)).toEqual([
			"chaos_event",
			"service_failed",
			"service_failed",
		]);
		expect(result.engineEvents[1]).toMatchObject({
			serviceId: 1,
			cause: "datacenter_outage",
			capacity: 10,
		});
		expect(result.state.entropy).toBe(10);
	});

	test.each([
		[1, "minor_glitch"],
		[4, "config_error"],
		[7, "security_breach"],
	] as const)("roll %i (%s) only raises entropy", (roll, kind) => {
		const state = unstable();
		const result = chaosEvent(state, scripted(face(roll, 8)));
		expect(result.engineEvents[0]).toMatchObject({ kind, roll });
		expect(result.state.services).toEqual(state.services);
		expect(result.state.entropy).toBe(Math.min(10, 3 + roll));
	});

	test("the table covers every d8 face", () => {
		expect(CHAOS_TABLE.map((e) => e.kind)).toEqual([
			"minor_glitch",
			"memory_leak",
			"ddos_attack",
			"config_error",
			"disk_full",
			"network_partition",
			"security_breach",
			"datacenter_outage",
		]);
	});
});

describe("setEntropy", () => {
	test("clamps into range", () => {
		const state = createGame();
		expect(setEntropy(state, 15).entropy).toBe(10);
		expect(setEntropy(state, -2).entropy).toBe(0);
		expect(setEntropy(state, 3.7).entropy).toBe(3);
	});

	test("returns the same state when nothing changes", () => {
		const state = createGame();
		expect(setEntropy(state, 0)).toBe(state);
	});
});
