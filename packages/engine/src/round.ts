import { capacityOf } from "./catalog";
import { beginStep, emit, finishStep } from "./context";
import { rollIn } from "./dice";
import type { RandomSource } from "./rng";
import { calculateUptime, isGameOver } from "./status";
import { routeFromEntryPoints } from "./traffic";
import type { GameState, Phase, StepResult } from "./types";

export const PHASE_ORDER: readonly Phase[] = [
	"traffic",
	"action",
	"resolution",
	"chaos",
];

const HEAL_LOAD_RATIO = 0.5;
const HEAL_CHANCE = 0.3;
const RESOLUTION_FAIL_RATIO = 1.5;
const RESOLUTION_FAIL_CHANCE = 0.4;
const RESOLUTION_DEGRADE_RATIO = 1.2;
const RESOLUTION_DEGRADE_CHANCE = 0.3;

export function nextPhase(phase: Phase): Phase {
	const idx = PHASE_ORDER.indexOf(phase);
	return PHASE_ORDER[(idx + 1) % PHASE_ORDER.length] ?? "traffic";
}

/** Drivers sequence the state machine; the engine never self-advances. */
export function setPhase(state: GameState, phase: Phase): GameState {
	if (state.phase === phase) return state;
	return { ...state, phase };
}

export type TrafficResult = StepResult & { requests: number };

/** Rolls 2d10 for this round's inbound volume. Routing is separate. */
export function generateTraffic(
	state: GameState,
	random?: RandomSource,
): TrafficResult {
	if (isGameOver(state)) return { state, engineEvents: [], requests: 0 };
	const ctx = beginStep(state, random);
	const { rolls, total } = rollIn(ctx, "d10", 2);
	emit(ctx, { type: "traffic_generated", requests: total, rolls });
	return { ...finishStep(ctx), requests: total };
}

/** generateTraffic followed by routing of the generated volume. */
export function runTrafficPhase(
	state: GameState,
	random?: RandomSource,
): TrafficResult {
	if (isGameOver(state)) return { state, engineEvents: [], requests: 0 };
	const ctx = beginStep(state, random);
	const { rolls, total } = rollIn(ctx, "d10", 2);
	emit(ctx, { type: "traffic_generated", requests: total, rolls });
	routeFromEntryPoints(ctx, total);
	return { ...finishStep(ctx), requests: total };
}

/**
 * Post-action overload checks: far-overloaded services may fail outright,
 * moderately overloaded healthy ones may degrade.
 */
export function resolveOverloads(
	state: GameState,
	random?: RandomSource,
): StepResult {
	if (isGameOver(state)) return { state, engineEvents: [] };
	const ctx = beginStep(state, random);
	for (const service of ctx.state.services) {
		const capacity = capacityOf(service);
		if (service.state === "failed" || service.load <= capacity) continue;

		if (service.load > capacity * RESOLUTION_FAIL_RATIO) {
			if (ctx.random() < RESOLUTION_FAIL_CHANCE) {
				service.state = "failed";
				emit(ctx, {
					type: "service_failed",
					serviceId: service.id,
					load: service.load,
					capacity,
					cause: "resolution",
				});
			}
		} else if (service.load > capacity * RESOLUTION_DEGRADE_RATIO) {
			if (ctx.random() < RESOLUTION_DEGRADE_CHANCE) {
				if (service.state === "healthy") service.state = "degraded";
			}
		}
	}
	return finishStep(ctx);
}

/**
 * Closes the round: snapshot uptime, refill action budgets, decay load,
 * give lightly loaded degraded services a chance to heal, bleed entropy.
 */
export function advanceRound(
	state: GameState,
	random?: RandomSource,
): StepResult {
	if (isGameOver(state)) return { state, engineEvents: [] };
	const ctx = beginStep(state, random);
	const next = ctx.state;

	next.round += 1;
	const uptime = calculateUptime(next);
	next.uptimeHistory.push(uptime);

	for (const player of next.players) {
		player.actionsRemaining = next.config.actionsPerRound;
	}

	for (const service of next.services) {
		service.load = Math.max(0, service.load - 1);
		if (
			service.state === "degraded" &&
			service.load < capacityOf(service) * HEAL_LOAD_RATIO &&
			ctx.random() < HEAL_CHANCE
		) {
			service.state = "healthy";
			emit(ctx, { type: "service_healed", serviceId: service.id });
		}
	}

	next.entropy = Math.max(0, next.entropy - 1);

	emit(ctx, {
		type: "round_end",
		uptime,
		entropy: next.entropy,
		totalRequests: next.totalRequests,
		successfulRequests: next.successfulRequests,
	});
	return finishStep(ctx);
}
