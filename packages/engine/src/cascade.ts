import { getService } from "./board";
import { emit, type StepContext } from "./context";
import { rollIn } from "./dice";
import type { Service, ServiceId } from "./types";

const CASCADE_DIE = "d20";
/** d20 at or under this cascades (40 %) */
const CASCADE_THRESHOLD = 8;
const CASCADE_LOAD = 5;
const PROPAGATION_CHANCE = 0.3;

/**
 * Resolves the cascade triggered by `origin` failing. A service originates
 * at most one check per resolution, which bounds recursion by the number of
 * services on the board.
 */
export function resolveCascade(ctx: StepContext, origin: Service) {
	checkCascade(ctx, origin, new Set<ServiceId>());
}

function checkCascade(
	ctx: StepContext,
	origin: Service,
	visited: Set<ServiceId>,
) {
	if (visited.has(origin.id)) return;
	visited.add(origin.id);

	const { total: roll } = rollIn(ctx, CASCADE_DIE);
	if (roll > CASCADE_THRESHOLD) {
		emit(ctx, {
			type: "cascade_check",
			originServiceId: origin.id,
			roll,
			cascaded: false,
			affected: [],
		});
		return;
	}

	const affected = origin.connections.filter(
		(id) => getService(ctx.state, id)?.state !== "failed",
	);
	emit(ctx, {
		type: "cascade_check",
		originServiceId: origin.id,
		roll,
		cascaded: true,
		affected,
	});

	for (const id of affected) {
		const neighbor = getService(ctx.state, id);
		if (!neighbor || neighbor.state === "failed") continue;
		neighbor.state = "cascading";
		neighbor.load += CASCADE_LOAD;
		if (ctx.random() < PROPAGATION_CHANCE) {
			checkCascade(ctx, neighbor, visited);
		}
	}
}
