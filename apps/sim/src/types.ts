import type { PlayerColor } from "@turnloop/engine";

export type { GameModule } from "@turnloop/games";

export type MatchReason = "terminal" | "maxTurns" | "illegal" | "stalled";

export type MatchTurn<A> = {
	turn: number;
	color: PlayerColor;
	action: A;
};

export type MatchLog<A, O> = {
	game: string;
	seed: number;
	players: Record<PlayerColor, string>;
	turns: MatchTurn<A>[];
	outcome: O | null;
};

export type MatchResult<A, O> = {
	seed: number;
	turns: number;
	outcome: O | null;
	winner: PlayerColor | null;
	illegalMoves: number;
	reason: MatchReason;
	log?: MatchLog<A, O>;
};
