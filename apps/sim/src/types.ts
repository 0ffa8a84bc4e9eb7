import type {
	Action,
	EngineEvent,
	GameSnapshot,
	GameState,
	PlayerId,
	PlayerStrategy,
	Resources,
	Winner,
} from "@service-grid/engine";

export type {
	Action,
	EngineEvent,
	GameConfigInput,
	GameSnapshot,
	GameState,
	PlayerId,
	PlayerStrategy,
	Winner,
} from "@service-grid/engine";

export type PlayerSummary = {
	id: PlayerId;
	name: string;
	strategy: PlayerStrategy;
	bot: string;
	finalScore: number;
	servicesOwned: number;
	finalResources: Resources;
};

export type GameResult = {
	seed: number;
	rounds: number;
	winner: Winner;
	cooperativeSuccess: boolean;
	finalUptime: number;
	totalRequests: number;
	successfulRequests: number;
	failedRequests: number;
	finalEntropy: number;
	actionsTaken: number;
	rejectedActions: number;
	players: PlayerSummary[];
	log?: GameLog;
};

export type GameLog = {
	seed: number;
	bots: string[];
	actions: Array<{ round: number; playerId: PlayerId; action: Action }>;
	engineEvents: EngineEvent[];
	finalState?: GameSnapshot;
};

export type Bot = {
	name: string;
	chooseAction: (ctx: {
		state: GameState;
		playerId: PlayerId;
		legalActions: Action[];
		rng: () => number;
	}) => Promise<Action | null> | Action | null;
};
