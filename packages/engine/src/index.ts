export {
	applyAction,
	grantResources,
	listLegalActions,
} from "./actions";
export {
	disconnect,
	getService,
	inBounds,
	isOccupied,
	neighborsOf,
	type PlaceResult,
	placeService,
	serviceAt,
} from "./board";
export {
	canAfford,
	capacityOf,
	costOf,
	isForwarder,
	isOverloaded,
	loadPercentage,
	REPAIR_CPU_COST,
	REPAIR_LOAD_RELIEF,
	SCALE_CPU_COST,
	SCALE_LOAD_RELIEF,
	SERVICE_CATALOG,
	SERVICE_KINDS,
	type ServiceCatalogEntry,
} from "./catalog";
export { CHAOS_TABLE, chaosEvent } from "./chaos";
export { cloneState } from "./context";
export { DIE_SIDES, DieKindSchema, type RollResult, rollDice } from "./dice";
export {
	type CreateGameOptions,
	createGame,
	DEFAULT_CONFIG,
	exportSnapshot,
	getPlayer,
	resolveConfig,
	setEntropy,
	startingPositions,
} from "./game";
export {
	mulberry32,
	pickOne,
	type RandomSource,
	sampleWithoutReplacement,
} from "./rng";
export {
	advanceRound,
	generateTraffic,
	nextPhase,
	PHASE_ORDER,
	resolveOverloads,
	runTrafficPhase,
	setPhase,
	type TrafficResult,
} from "./round";
export {
	ActionSchema,
	GameConfigSchema,
	type GameSnapshot,
	GameSnapshotSchema,
	PhaseSchema,
	PositionSchema,
	ServiceKindSchema,
	ServiceStateSchema,
} from "./schema";
export { calculateUptime, getWinner, isGameOver } from "./status";
export { processRequests } from "./traffic";
export * from "./types";
