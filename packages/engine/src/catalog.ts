import type { Resources, Service, ServiceKind } from "./types";

export type ServiceCatalogEntry = {
	cpuCost: number;
	memoryCost: number;
	storageCost: number;
	/** Max sustainable load */
	capacity: number;
	/** Informational only */
	baseLatency: number;
};

export const SERVICE_KINDS: readonly ServiceKind[] = [
	"compute",
	"database",
	"cache",
	"queue",
	"load_balancer",
	"api_gateway",
];

export const SERVICE_CATALOG: Readonly<
	Record<ServiceKind, Readonly<ServiceCatalogEntry>>
> = {
	compute: {
		cpuCost: 2,
		memoryCost: 2,
		storageCost: 1,
		capacity: 5,
		baseLatency: 10,
	},
	database: {
		cpuCost: 1,
		memoryCost: 2,
		storageCost: 3,
		capacity: 3,
		baseLatency: 50,
	},
	cache: {
		cpuCost: 1,
		memoryCost: 3,
		storageCost: 1,
		capacity: 8,
		baseLatency: 5,
	},
	queue: {
		cpuCost: 1,
		memoryCost: 1,
		storageCost: 2,
		capacity: 6,
		baseLatency: 15,
	},
	load_balancer: {
		cpuCost: 2,
		memoryCost: 1,
		storageCost: 1,
		capacity: 10,
		baseLatency: 8,
	},
	api_gateway: {
		cpuCost: 1,
		memoryCost: 1,
		storageCost: 1,
		capacity: 7,
		baseLatency: 12,
	},
};

export const REPAIR_CPU_COST = 2;
export const REPAIR_LOAD_RELIEF = 3;
export const SCALE_CPU_COST = 1;
export const SCALE_LOAD_RELIEF = 2;

export function costOf(kind: ServiceKind): Resources {
	const entry = SERVICE_CATALOG[kind];
	return {
		cpu: entry.cpuCost,
		memory: entry.memoryCost,
		storage: entry.storageCost,
	};
}

export function canAfford(wallet: Resources, kind: ServiceKind): boolean {
	const cost = costOf(kind);
	return (
		wallet.cpu >= cost.cpu &&
		wallet.memory >= cost.memory &&
		wallet.storage >= cost.storage
	);
}

export function capacityOf(service: Pick<Service, "kind">): number {
	return SERVICE_CATALOG[service.kind].capacity;
}

export function isOverloaded(service: Pick<Service, "kind" | "load">): boolean {
	return service.load > capacityOf(service);
}

export function loadPercentage(
	service: Pick<Service, "kind" | "load">,
): number {
	return (service.load / capacityOf(service)) * 100;
}

/** Traffic forwarders: everything else terminates requests. */
export function isForwarder(kind: ServiceKind): boolean {
	return kind === "load_balancer" || kind === "api_gateway";
}
