import { disconnect } from "./board";
import { capacityOf } from "./catalog";
import { beginStep, emit, finishStep, type StepContext } from "./context";
import { rollIn } from "./dice";
import { pickOne, type RandomSource, sampleWithoutReplacement } from "./rng";
import { isGameOver } from "./status";
import type { ChaosKind, GameState, StepResult } from "./types";

/** Indexed by d8 result − 1 */
export const CHAOS_TABLE: ReadonlyArray<{
	kind: ChaosKind;
	description: string;
}> = [
	{ kind: "minor_glitch", description: "Minor network glitch" },
	{ kind: "memory_leak", description: "Memory leak in random service" },
	{ kind: "ddos_attack", description: "DDoS attack increases all load" },
	{
		kind: "config_error",
		description: "Configuration error affects API gateways",
	},
	{ kind: "disk_full", description: "Disk full on database services" },
	{
		kind: "network_partition",
		description: "Network partition breaks connections",
	},
	{
		kind: "security_breach",
		description: "Security breach requires service restarts",
	},
	{
		kind: "datacenter_outage",
		description: "Datacenter outage affects multiple services",
	},
];

const DDOS_LOAD = 3;
const MEMORY_LEAK_LOAD = 2;
const DISK_FULL_LOAD = 5;
const PARTITION_ATTEMPTS = 3;
const OUTAGE_FAILURES = 2;

/**
 * Fires one chaos event once entropy has reached the threshold, then raises
 * entropy by the d8 result. Below the threshold nothing is rolled.
 */
export function chaosEvent(
	state: GameState,
	random?: RandomSource,
): StepResult {
	if (isGameOver(state)) return { state, engineEvents: [] };
	if (state.entropy < state.config.chaosThreshold) {
		return { state, engineEvents: [] };
	}

	const ctx = beginStep(state, random);
	const { total: roll } = rollIn(ctx, "d8");
	const entry = CHAOS_TABLE[roll - 1];
	if (!entry) throw new Error(`No chaos event for roll ${roll}`);

	const entropyBefore = ctx.state.entropy;
	const entropyAfter = Math.min(
		ctx.state.config.maxEntropy,
		entropyBefore + roll,
	);
	emit(ctx, {
		type: "chaos_event",
		kind: entry.kind,
		description: entry.description,
		roll,
		entropyBefore,
		entropyAfter,
	});

	applyChaosEffects(ctx, entry.kind);
	ctx.state.entropy = entropyAfter;
	return finishStep(ctx);
}

function applyChaosEffects(ctx: StepContext, kind: ChaosKind) {
	const { services } = ctx.state;
	switch (kind) {
		case "ddos_attack":
			for (const s of services) {
				if (s.kind === "load_balancer" || s.kind === "api_gateway") {
					s.load += DDOS_LOAD;
				}
			}
			break;
		case "memory_leak": {
			const healthy = services.filter((s) => s.state === "healthy");
			if (healthy.length === 0) break;
			const victim = pickOne(healthy, ctx.random);
			victim.state = "degraded";
			victim.load += MEMORY_LEAK_LOAD;
			break;
		}
		case "disk_full":
			for (const s of services) {
				if (s.kind === "database") {
					s.state = "overloaded";
					s.load += DISK_FULL_LOAD;
				}
			}
			break;
		case "network_partition": {
			const attempts = Math.min(PARTITION_ATTEMPTS, services.length);
			for (let i = 0; i < attempts; i++) {
				const service = pickOne(services, ctx.random);
				if (service.connections.length === 0) continue;
				const peer = pickOne(service.connections, ctx.random);
				disconnect(ctx.state, service.id, peer);
			}
			break;
		}
		case "datacenter_outage": {
			const live = services.filter((s) => s.state !== "failed");
			for (const s of sampleWithoutReplacement(
				live,
				OUTAGE_FAILURES,
				ctx.random,
			)) {
				s.state = "failed";
				emit(ctx, {
					type: "service_failed",
					serviceId: s.id,
					load: s.load,
					capacity: capacityOf(s),
					cause: "datacenter_outage",
				});
			}
			break;
		}
		case "minor_glitch":
		case "config_error":
		case "security_breach":
			// Logged only; no board effect.
			break;
	}
}
