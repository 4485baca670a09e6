import type { Agent, PlayerColor } from "@turnloop/engine";
import { playMatch } from "./match";
import { deriveSeed } from "./rng";
import type { GameModule, MatchResult } from "./types";

export type Entrant<S, A> = {
	id: string;
	/** Called once per game, so agents never carry memory across matches. */
	create: (seed: number) => Agent<S, A>;
};

export type TournamentGame<A, O> = MatchResult<A, O> & {
	seats: Record<PlayerColor, string>;
	winnerId: string | null;
};

export type TournamentSummary = {
	games: number;
	seed: number;
	maxTurns: number;
	wins: Record<string, number>;
	/** Games that reached an outcome without a winner. */
	draws: number;
	/** Games cut off by `maxTurns`, an illegal action or a stalled state. */
	unfinished: number;
	avgTurns: number;
	illegalMoveRate: number;
};

export function runTournament<S, A, O>(opts: {
	module: GameModule<S, A, O>;
	entrants: [Entrant<S, A>, Entrant<S, A>];
	games: number;
	seed: number;
	maxTurns: number;
	swapSeats?: boolean;
	autofixIllegal?: boolean;
}): { summary: TournamentSummary; results: TournamentGame<A, O>[] } {
	const [first, second] = opts.entrants;
	if (first.id === second.id) {
		throw new Error(`Entrant ids must differ, both are "${first.id}"`);
	}

	const results: TournamentGame<A, O>[] = [];
	for (let i = 0; i < opts.games; i++) {
		const matchSeed = (opts.seed + i) >>> 0;
		const swap = (opts.swapSeats ?? true) && i % 2 === 1;
		const black = swap ? second : first;
		const white = swap ? first : second;
		const r = playMatch({
			module: opts.module,
			players: {
				black: black.create(deriveSeed(matchSeed, 1)),
				white: white.create(deriveSeed(matchSeed, 2)),
			},
			seed: matchSeed,
			maxTurns: opts.maxTurns,
			autofixIllegal: opts.autofixIllegal,
		});
		const winnerId =
			r.winner === null ? null : r.winner === "black" ? black.id : white.id;
		results.push({
			...r,
			seats: { black: black.id, white: white.id },
			winnerId,
		});
	}

	const wins: Record<string, number> = { [first.id]: 0, [second.id]: 0 };
	let draws = 0;
	let unfinished = 0;
	let totalTurns = 0;
	let totalIllegal = 0;

	for (const r of results) {
		totalTurns += r.turns;
		totalIllegal += r.illegalMoves;
		if (r.reason !== "terminal") unfinished++;
		else if (r.winnerId == null) draws++;
		else wins[r.winnerId] = (wins[r.winnerId] ?? 0) + 1;
	}

	const summary: TournamentSummary = {
		games: opts.games,
		seed: opts.seed,
		maxTurns: opts.maxTurns,
		wins,
		draws,
		unfinished,
		avgTurns: Number((totalTurns / Math.max(1, opts.games)).toFixed(2)),
		illegalMoveRate: Number(
			(totalIllegal / Math.max(1, totalTurns)).toFixed(4),
		),
	};

	return { summary, results };
}
