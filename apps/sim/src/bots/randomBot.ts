import { pickOne } from "@service-grid/engine";
import type { Bot } from "../types";

export function makeRandomBot(): Bot {
	return {
		name: "RandomBot",
		chooseAction: ({ legalActions, rng }) =>
			legalActions.length > 0 ? pickOne(legalActions, rng) : null,
	};
}
