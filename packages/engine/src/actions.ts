import { getService, inBounds, isOccupied, placeService } from "./board";
import {
	canAfford,
	costOf,
	REPAIR_CPU_COST,
	REPAIR_LOAD_RELIEF,
	SCALE_CPU_COST,
	SCALE_LOAD_RELIEF,
	SERVICE_KINDS,
} from "./catalog";
import { beginStep, emit, stamp } from "./context";
import { ActionSchema } from "./schema";
import { isGameOver } from "./status";
import type {
	Action,
	ActionRejectionReason,
	ApplyActionResult,
	GameState,
	PlayerId,
	PlayerState,
	Resources,
	ServiceState,
} from "./types";

function findPlayer(
	state: GameState,
	playerId: PlayerId,
): PlayerState | undefined {
	return state.players.find((p) => p.id === playerId);
}

function isRepairable(state: ServiceState) {
	return state === "degraded" || state === "overloaded";
}

export function listLegalActions(
	state: GameState,
	playerId: PlayerId,
): Action[] {
	const player = findPlayer(state, playerId);
	if (!player || player.actionsRemaining <= 0 || isGameOver(state)) {
		return [];
	}

	const actions: Action[] = [];
	const { boardRows, boardCols } = state.config;

	for (const kind of SERVICE_KINDS) {
		if (!canAfford(player, kind)) continue;
		for (let row = 0; row < boardRows; row++) {
			for (let col = 0; col < boardCols; col++) {
				if (isOccupied(state, [row, col])) continue;
				actions.push({
					type: "deploy",
					serviceType: kind,
					position: [row, col],
				});
			}
		}
	}

	for (const serviceId of player.servicesOwned) {
		const service = getService(state, serviceId);
		if (service && isRepairable(service.state)) {
			actions.push({ type: "repair", serviceId });
		}
	}

	if (player.cpu >= SCALE_CPU_COST) {
		for (const serviceId of player.servicesOwned) {
			if (getService(state, serviceId)?.state === "healthy") {
				actions.push({ type: "scale", serviceId });
			}
		}
	}

	return actions;
}

/**
 * Validates and applies one action. Every rejection returns the caller's
 * state object untouched, so a failed action never has a partial effect.
 */
export function applyAction(
	state: GameState,
	playerId: PlayerId,
	action: Action,
): ApplyActionResult {
	const parsed = ActionSchema.safeParse(action);
	if (!parsed.success) {
		return reject(
			state,
			playerId,
			action,
			"invalid_action",
			"Malformed action.",
		);
	}
	if (isGameOver(state)) {
		return reject(state, playerId, action, "terminal", "Game is over.");
	}
	const current = findPlayer(state, playerId);
	if (!current) {
		return reject(
			state,
			playerId,
			action,
			"unknown_player",
			`No player ${playerId}.`,
		);
	}
	if (current.actionsRemaining <= 0) {
		return reject(
			state,
			playerId,
			action,
			"no_actions_remaining",
			"No actions remaining this round.",
		);
	}

	const m = parsed.data;
	const ctx = beginStep(state);
	const next = ctx.state;
	const player = findPlayer(next, playerId);
	if (!player) {
		return reject(
			state,
			playerId,
			action,
			"unknown_player",
			`No player ${playerId}.`,
		);
	}

	switch (m.type) {
		case "deploy": {
			if (!inBounds(next.config, m.position)) {
				return reject(
					state,
					playerId,
					action,
					"out_of_bounds",
					"Position is off the board.",
				);
			}
			if (isOccupied(next, m.position)) {
				return reject(
					state,
					playerId,
					action,
					"position_occupied",
					"Position already holds a service.",
				);
			}
			if (!canAfford(player, m.serviceType)) {
				return reject(
					state,
					playerId,
					action,
					"insufficient_resources",
					`Cannot afford ${m.serviceType}.`,
				);
			}
			const placed = placeService(next, m.serviceType, m.position, playerId);
			if (!placed.ok) {
				return reject(
					state,
					playerId,
					action,
					placed.reason,
					"Placement failed.",
				);
			}
			spend(player, costOf(m.serviceType));
			emit(ctx, {
				type: "deploy_service",
				playerId,
				serviceId: placed.service.id,
				serviceType: m.serviceType,
				position: placed.service.position,
			});
			break;
		}
		case "repair": {
			const service = getService(next, m.serviceId);
			if (!service) {
				return reject(
					state,
					playerId,
					action,
					"unknown_service",
					`No service ${m.serviceId}.`,
				);
			}
			if (!player.servicesOwned.includes(service.id)) {
				return reject(
					state,
					playerId,
					action,
					"not_owned",
					"Service belongs to another player.",
				);
			}
			if (!isRepairable(service.state)) {
				return reject(
					state,
					playerId,
					action,
					"invalid_service_state",
					`Cannot repair a ${service.state} service.`,
				);
			}
			if (player.cpu < REPAIR_CPU_COST) {
				return reject(
					state,
					playerId,
					action,
					"insufficient_resources",
					`Repair needs ${REPAIR_CPU_COST} cpu.`,
				);
			}
			service.state = "healthy";
			service.load = Math.max(0, service.load - REPAIR_LOAD_RELIEF);
			player.cpu -= REPAIR_CPU_COST;
			emit(ctx, {
				type: "repair_service",
				playerId,
				serviceId: service.id,
				loadAfter: service.load,
			});
			break;
		}
		case "scale": {
			// Any owned service may be scaled, whatever its state.
			const service = getService(next, m.serviceId);
			if (!service) {
				return reject(
					state,
					playerId,
					action,
					"unknown_service",
					`No service ${m.serviceId}.`,
				);
			}
			if (!player.servicesOwned.includes(service.id)) {
				return reject(
					state,
					playerId,
					action,
					"not_owned",
					"Service belongs to another player.",
				);
			}
			if (player.cpu < SCALE_CPU_COST) {
				return reject(
					state,
					playerId,
					action,
					"insufficient_resources",
					`Scaling needs ${SCALE_CPU_COST} cpu.`,
				);
			}
			service.load = Math.max(0, service.load - SCALE_LOAD_RELIEF);
			player.cpu -= SCALE_CPU_COST;
			emit(ctx, {
				type: "scale_service",
				playerId,
				serviceId: service.id,
				loadAfter: service.load,
			});
			break;
		}
	}

	player.actionsRemaining -= 1;
	player.score += 1;
	return { ok: true, state: next, engineEvents: ctx.events };
}

/** Adds resources, each pool capped at `resourceCap`. */
export function grantResources(
	state: GameState,
	playerId: PlayerId,
	gain: Partial<Resources>,
): GameState {
	if (!findPlayer(state, playerId)) return state;
	const cap = state.config.resourceCap;
	return {
		...state,
		players: state.players.map((p) =>
			p.id === playerId
				? {
						...p,
						cpu: Math.min(cap, p.cpu + Math.max(0, gain.cpu ?? 0)),
						memory: Math.min(cap, p.memory + Math.max(0, gain.memory ?? 0)),
						storage: Math.min(cap, p.storage + Math.max(0, gain.storage ?? 0)),
					}
				: p,
		),
	};
}

function spend(player: PlayerState, cost: Resources) {
	player.cpu -= cost.cpu;
	player.memory -= cost.memory;
	player.storage -= cost.storage;
}

function reject(
	state: GameState,
	playerId: PlayerId,
	action: unknown,
	reason: ActionRejectionReason,
	error: string,
): ApplyActionResult {
	return {
		ok: false,
		state,
		engineEvents: [stamp(state, { type: "reject", playerId, action, reason })],
		reason,
		error,
	};
}
