import { getService } from "./board";
import { resolveCascade } from "./cascade";
import { capacityOf, isForwarder } from "./catalog";
import { beginStep, emit, finishStep, type StepContext } from "./context";
import type { RandomSource } from "./rng";
import { isGameOver } from "./status";
import type { GameState, Service, StepResult } from "./types";

/** Runaway guard; forwarding itself stops much earlier. */
const MAX_ROUTE_DEPTH = 10;
const MAX_FORWARD_DEPTH = 3;
const MAX_FAILURE_CHANCE = 0.8;

/**
 * Routes `requests` through the network from every live load balancer.
 * `successfulRequests + failedRequests` grows by exactly `requests`.
 */
export function processRequests(
	state: GameState,
	requests: number,
	random?: RandomSource,
): StepResult {
	if (isGameOver(state)) return { state, engineEvents: [] };
	if (!Number.isInteger(requests) || requests < 0) {
		throw new Error(
			`Request volume must be a non-negative integer, got ${requests}`,
		);
	}
	const ctx = beginStep(state, random);
	routeFromEntryPoints(ctx, requests);
	return finishStep(ctx);
}

export function routeFromEntryPoints(ctx: StepContext, requests: number) {
	const { state } = ctx;
	state.totalRequests += requests;

	const entryPoints = state.services.filter(
		(s) => s.kind === "load_balancer" && s.state !== "failed",
	);
	if (entryPoints.length === 0) {
		state.failedRequests += requests;
		emit(ctx, {
			type: "all_requests_failed",
			requests,
			reason: "no_load_balancers",
		});
		return;
	}

	const perEntry = Math.floor(requests / entryPoints.length);
	const extra = requests % entryPoints.length;
	entryPoints.forEach((lb, i) => {
		route(ctx, lb, perEntry + (i < extra ? 1 : 0), 0);
	});
}

function route(
	ctx: StepContext,
	service: Service,
	amount: number,
	depth: number,
) {
	const { state } = ctx;
	if (depth > MAX_ROUTE_DEPTH || service.state === "failed") {
		state.failedRequests += amount;
		return;
	}

	service.load += amount;
	applyOverload(ctx, service);

	if (
		isForwarder(service.kind) &&
		service.connections.length > 0 &&
		depth < MAX_FORWARD_DEPTH
	) {
		const downstream: Service[] = [];
		for (const id of service.connections) {
			const next = getService(state, id);
			if (next && next.state !== "failed") downstream.push(next);
		}
		if (downstream.length === 0) {
			state.failedRequests += amount;
			return;
		}
		const share = Math.floor(amount / downstream.length);
		// The indivisible remainder cannot be delivered anywhere.
		state.failedRequests += amount - share * downstream.length;
		for (const next of downstream) {
			route(ctx, next, share, depth + 1);
		}
		return;
	}

	if (service.state === "failed") {
		state.failedRequests += amount;
	} else {
		state.successfulRequests += amount;
	}
}

function applyOverload(ctx: StepContext, service: Service) {
	const capacity = capacityOf(service);
	if (service.load <= capacity) return;

	if (service.state === "healthy") {
		service.state = "degraded";
	} else if (service.state === "degraded") {
		service.state = "overloaded";
	}

	const excess = service.load - capacity;
	if (excess <= capacity) return;

	const failureChance = Math.min(MAX_FAILURE_CHANCE, excess / capacity);
	if (ctx.random() < failureChance) {
		service.state = "failed";
		emit(ctx, {
			type: "service_failed",
			serviceId: service.id,
			load: service.load,
			capacity,
			cause: "overload",
		});
		resolveCascade(ctx, service);
	}
}
