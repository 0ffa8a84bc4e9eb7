// Service Grid — hex-board service network under traffic, cascades and chaos

export type PlayerId = number;
export type ServiceId = number;

export type ServiceKind =
	| "compute"
	| "database"
	| "cache"
	| "queue"
	| "load_balancer"
	| "api_gateway";

export type ServiceState =
	| "healthy"
	| "degraded"
	| "overloaded"
	| "failed"
	| "cascading";

export type Phase = "traffic" | "action" | "resolution" | "chaos";

export type PlayerStrategy = "aggressive" | "defensive" | "balanced" | "random";

export type DieKind = "d4" | "d6" | "d8" | "d10" | "d12" | "d20";

/** [row, col] on the odd-row offset grid */
export type Position = [row: number, col: number];

export type ChaosKind =
	| "minor_glitch"
	| "memory_leak"
	| "ddos_attack"
	| "config_error"
	| "disk_full"
	| "network_partition"
	| "security_breach"
	| "datacenter_outage";

export type Action =
	| { type: "deploy"; serviceType: ServiceKind; position: Position }
	| { type: "repair"; serviceId: ServiceId }
	| { type: "scale"; serviceId: ServiceId };

export type Service = {
	id: ServiceId;
	kind: ServiceKind;
	position: Position;
	state: ServiceState;
	load: number;
	bugs: number;
	connections: ServiceId[];
	owner: PlayerId;
};

export type Resources = {
	cpu: number;
	memory: number;
	storage: number;
};

export type PlayerState = Resources & {
	id: PlayerId;
	name: string;
	strategy: PlayerStrategy;
	score: number;
	servicesOwned: ServiceId[];
	actionsRemaining: number;
};

export type GameConfig = {
	boardRows: number;
	boardCols: number;
	maxRounds: number;
	uptimeTarget: number;
	maxEntropy: number;
	chaosThreshold: number;
	cooperativeMode: boolean;
	actionsPerRound: number;
	startingResources: number;
	resourceCap: number;
};

export type GameConfigInput = Partial<GameConfig>;

export type DiceRoll = {
	die: DieKind;
	count: number;
	rolls: number[];
	total: number;
	round: number;
	phase: Phase;
};

export type GameState = {
	seed: number;
	rngState: number;
	config: GameConfig;
	round: number;
	phase: Phase;
	entropy: number;
	players: PlayerState[];
	services: Service[];
	/** Row-major, `boardRows * boardCols` cells */
	board: Array<ServiceId | null>;
	nextServiceId: ServiceId;
	totalRequests: number;
	successfulRequests: number;
	failedRequests: number;
	uptimeHistory: number[];
	eventLog: EngineEvent[];
	diceHistory: DiceRoll[];
	lastDiceRoll: DiceRoll | null;
};

export type ActionRejectionReason =
	| "invalid_action"
	| "unknown_player"
	| "terminal"
	| "no_actions_remaining"
	| "out_of_bounds"
	| "position_occupied"
	| "insufficient_resources"
	| "unknown_service"
	| "not_owned"
	| "invalid_service_state";

type EventBase = { round: number; phase: Phase };

export type EngineEvent = EventBase &
	(
		| {
				type: "initial_placement" | "deploy_service";
				playerId: PlayerId;
				serviceId: ServiceId;
				serviceType: ServiceKind;
				position: Position;
		  }
		| {
				type: "repair_service" | "scale_service";
				playerId: PlayerId;
				serviceId: ServiceId;
				loadAfter: number;
		  }
		| { type: "traffic_generated"; requests: number; rolls: number[] }
		| {
				type: "all_requests_failed";
				requests: number;
				reason: "no_load_balancers";
		  }
		| {
				type: "service_failed";
				serviceId: ServiceId;
				load: number;
				capacity: number;
				cause: "overload" | "resolution" | "datacenter_outage";
		  }
		| {
				type: "cascade_check";
				originServiceId: ServiceId;
				roll: number;
				cascaded: boolean;
				affected: ServiceId[];
		  }
		| {
				type: "chaos_event";
				kind: ChaosKind;
				description: string;
				roll: number;
				entropyBefore: number;
				entropyAfter: number;
		  }
		| { type: "service_healed"; serviceId: ServiceId }
		| {
				type: "round_end";
				uptime: number;
				entropy: number;
				totalRequests: number;
				successfulRequests: number;
		  }
		| {
				type: "reject";
				playerId: PlayerId;
				action: unknown;
				reason: ActionRejectionReason;
		  }
	);

export type StepResult = {
	state: GameState;
	engineEvents: EngineEvent[];
};

export type ApplyActionResult =
	| { ok: true; state: GameState; engineEvents: EngineEvent[] }
	| {
			ok: false;
			state: GameState;
			engineEvents: EngineEvent[];
			reason: ActionRejectionReason;
			error: string;
	  };

/** Cooperative success sentinel returned by `getWinner` */
export const TEAM_WINNER = "team" as const;

export type Winner = PlayerId | typeof TEAM_WINNER | null;
