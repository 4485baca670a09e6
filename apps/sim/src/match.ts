import { isDeepStrictEqual } from "node:util";
import {
	type Agent,
	GameRunner,
	IllegalActionError,
	isLegalAction,
	type Seats,
	StalledGameError,
	TurnLimitError,
} from "@turnloop/engine";
import { log } from "./obs/log";
import { mulberry32, pickOne } from "./rng";
import type {
	GameModule,
	MatchLog,
	MatchReason,
	MatchResult,
	MatchTurn,
} from "./types";

/** An agent threw instead of answering. */
export class AgentCrashError extends Error {
	readonly agent: string;

	constructor(agent: string, cause: unknown) {
		super(`agent ${agent} crashed: ${String(cause)}`, { cause });
		this.name = "AgentCrashError";
		this.agent = agent;
	}
}

export function playMatch<S, A, O>(opts: {
	module: GameModule<S, A, O>;
	players: Seats<S, A>;
	seed: number;
	maxTurns: number;
	/**
	 * Defaults to `module.createInitialState()`. Cannot be combined with
	 * `record`: logs replay from the module's initial state.
	 */
	initialState?: S;
	verbose?: boolean;
	record?: boolean;
	autofixIllegal?: boolean;
}): MatchResult<A, O> {
	const { module, players } = opts;
	if (opts.record && opts.initialState !== undefined) {
		throw new Error(
			"record cannot be combined with initialState; replay starts from the module's initial state",
		);
	}
	const { game } = module;
	const rng = mulberry32(opts.seed);
	const state = opts.initialState ?? module.createInitialState();
	const turns: MatchTurn<A>[] = [];
	let illegalMoves = 0;

	// Wraps a seat so crashes surface as AgentCrashError, and with
	// autofixIllegal so bad picks become a random legal action.
	const guard = (agent: Agent<S, A>): Agent<S, A> => ({
		name: agent.name,
		pickAction: (current, actions) => {
			let picked: A;
			try {
				picked = agent.pickAction(current, actions);
			} catch (e) {
				if (!opts.autofixIllegal) throw new AgentCrashError(agent.name, e);
				illegalMoves++;
				log("warn", "agent crashed; substituting a legal action", {
					agent: agent.name,
					turn: turns.length + 1,
					error: String(e),
				});
				return pickOne(actions, rng);
			}
			if (!opts.autofixIllegal || isLegalAction(game, actions, picked)) {
				return picked;
			}
			illegalMoves++;
			log("warn", "agent chose an illegal action; forcing legal", {
				agent: agent.name,
				turn: turns.length + 1,
				action: game.describeAction(picked),
			});
			return pickOne(actions, rng);
		},
	});

	const runner = new GameRunner(
		game,
		{ black: guard(players.black), white: guard(players.white) },
		state,
		{
			maxTurns: opts.maxTurns,
			onTurn: ({ turn, color, action, agent }) => {
				turns.push({ turn, color, action });
				if (opts.verbose) {
					log("info", "turn", {
						turn,
						color,
						agent,
						action: game.describeAction(action),
					});
				}
			},
		},
	);

	const completeMatch = (
		outcome: O | null,
		reason: MatchReason,
	): MatchResult<A, O> => ({
		seed: opts.seed,
		turns: turns.length,
		outcome,
		winner: outcome === null ? null : module.winnerOf(outcome),
		illegalMoves,
		reason,
		log: opts.record
			? {
					game: module.id,
					seed: opts.seed,
					players: { black: players.black.name, white: players.white.name },
					turns: [...turns],
					outcome,
				}
			: undefined,
	});

	try {
		const { outcome } = runner.play();
		return completeMatch(outcome, "terminal");
	} catch (e) {
		if (e instanceof TurnLimitError) return completeMatch(null, "maxTurns");
		if (e instanceof StalledGameError) {
			log("error", e.message, { game: module.id, turn: e.turn });
			return completeMatch(null, "stalled");
		}
		if (e instanceof IllegalActionError || e instanceof AgentCrashError) {
			illegalMoves++;
			log("warn", e.message, { game: module.id, seed: opts.seed });
			return completeMatch(null, "illegal");
		}
		throw e;
	}
}

export type ReplayResult = {
	ok: boolean;
	mismatchAt?: number;
	error?: string;
};

/** Re-applies a recorded match from the module's initial state. */
export function replayMatch<S, A, O>(
	module: GameModule<S, A, O>,
	matchLog: MatchLog<A, O>,
): ReplayResult {
	const { game } = module;
	const state = module.createInitialState();

	for (let i = 0; i < matchLog.turns.length; i++) {
		const entry = matchLog.turns[i];
		if (!entry) break;
		if (game.outcome(state) !== null) {
			return { ok: false, mismatchAt: i, error: "Game decided early." };
		}
		if (game.currentPlayerTurn(state) !== entry.color) {
			return { ok: false, mismatchAt: i, error: "Turn order mismatch." };
		}
		if (!isLegalAction(game, game.legalActions(state), entry.action)) {
			return { ok: false, mismatchAt: i, error: "Illegal recorded action." };
		}
		game.makeNext(state, entry.action);
	}

	if (!isDeepStrictEqual(game.outcome(state), matchLog.outcome)) {
		return { ok: false, error: "Final outcome mismatch." };
	}

	return { ok: true };
}
