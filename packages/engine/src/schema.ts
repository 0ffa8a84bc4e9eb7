import { z } from "zod";

// ---------------------------------------------------------------------------
// Zod Schemas
// ---------------------------------------------------------------------------

export const ServiceKindSchema = z.enum([
	"compute",
	"database",
	"cache",
	"queue",
	"load_balancer",
	"api_gateway",
]);

export const ServiceStateSchema = z.enum([
	"healthy",
	"degraded",
	"overloaded",
	"failed",
	"cascading",
]);

export const PhaseSchema = z.enum(["traffic", "action", "resolution", "chaos"]);

export const PositionSchema = z.tuple([z.number().int(), z.number().int()]);

export const ActionSchema = z.discriminatedUnion("type", [
	z
		.object({
			type: z.literal("deploy"),
			serviceType: ServiceKindSchema,
			position: PositionSchema,
		})
		.strict(),
	z
		.object({
			type: z.literal("repair"),
			serviceId: z.number().int(),
		})
		.strict(),
	z
		.object({
			type: z.literal("scale"),
			serviceId: z.number().int(),
		})
		.strict(),
]);

export const GameConfigSchema = z
	.object({
		boardRows: z.number().int().min(1),
		boardCols: z.number().int().min(1),
		maxRounds: z.number().int().min(1),
		uptimeTarget: z.number().min(0).max(1),
		maxEntropy: z.number().int().min(0),
		chaosThreshold: z.number().int().min(0),
		cooperativeMode: z.boolean(),
		actionsPerRound: z.number().int().min(0),
		startingResources: z.number().int().min(0),
		resourceCap: z.number().int().min(0),
	})
	.strict();

const PlayerSnapshotSchema = z.object({
	id: z.number().int(),
	name: z.string(),
	strategy: z.enum(["aggressive", "defensive", "balanced", "random"]),
	cpu: z.number().int(),
	memory: z.number().int(),
	storage: z.number().int(),
	score: z.number().int(),
	actionsRemaining: z.number().int(),
	servicesOwned: z.array(z.number().int()),
});

const ServiceSnapshotSchema = z.object({
	id: z.number().int(),
	type: ServiceKindSchema,
	position: PositionSchema,
	state: ServiceStateSchema,
	load: z.number().int().min(0),
	capacity: z.number().int().positive(),
	bugs: z.number().int().min(0),
	connections: z.array(z.number().int()),
	owner: z.number().int(),
});

export const GameSnapshotSchema = z.object({
	round: z.number().int(),
	phase: PhaseSchema,
	entropy: z.number().int(),
	uptime: z.number().min(0).max(1),
	players: z.array(PlayerSnapshotSchema),
	services: z.array(ServiceSnapshotSchema),
	totalRequests: z.number().int(),
	successfulRequests: z.number().int(),
	failedRequests: z.number().int(),
	uptimeHistory: z.array(z.number()),
});

export type GameSnapshot = z.infer<typeof GameSnapshotSchema>;
