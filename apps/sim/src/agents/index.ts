import type { Agent } from "@turnloop/engine";
import type { GameModule } from "@turnloop/games";
import type { Rng } from "../rng";
import { makeFirstActionAgent } from "./firstAgent";
import { makeGreedyAgent } from "./greedyAgent";
import { makeRandomAgent } from "./randomAgent";

export { makeFirstActionAgent } from "./firstAgent";
export { makeGreedyAgent } from "./greedyAgent";
export { makeRandomAgent } from "./randomAgent";
export { makeScriptedAgent } from "./scriptedAgent";

export const AGENT_KINDS = ["first", "random", "greedy"] as const;
export type AgentKind = (typeof AGENT_KINDS)[number];

export function isAgentKind(value: unknown): value is AgentKind {
	return AGENT_KINDS.some((kind) => kind === value);
}

export function makeAgent<S, A, O>(
	kind: AgentKind,
	module: GameModule<S, A, O>,
	rng: Rng,
): Agent<S, A> {
	switch (kind) {
		case "first":
			return makeFirstActionAgent();
		case "greedy":
			return makeGreedyAgent({
				game: module.game,
				score: module.scoreState,
				rng,
			});
		case "random":
			return makeRandomAgent(rng);
	}
}
