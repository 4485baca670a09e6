import type { Game, PlayerColor } from "@turnloop/engine";
import type { z } from "zod";
import {
	type CounterAction,
	CounterActionSchema,
	type CounterOutcome,
	CounterOutcomeSchema,
	type CounterState,
	counterRace,
	createCounterState,
} from "./counter";
import {
	createTicTacToeState,
	type TicTacToeAction,
	TicTacToeActionSchema,
	type TicTacToeOutcome,
	TicTacToeOutcomeSchema,
	type TicTacToeState,
	ticTacToe,
} from "./tictactoe";

/** Everything the simulator needs to host a game. */
export type GameModule<S, A, O> = {
	id: string;
	game: Game<S, A, O>;
	createInitialState: () => S;
	actionSchema: z.ZodType<A>;
	outcomeSchema: z.ZodType<O>;
	winnerOf: (outcome: O) => PlayerColor | null;
	/** Heuristic value of a position for `color`; higher is better. */
	scoreState: (state: S, color: PlayerColor) => number;
};

export const counterModule: GameModule<
	CounterState,
	CounterAction,
	CounterOutcome
> = {
	id: "counter",
	game: counterRace,
	createInitialState: () => createCounterState(),
	actionSchema: CounterActionSchema,
	outcomeSchema: CounterOutcomeSchema,
	winnerOf: (outcome) => {
		switch (outcome) {
			case "blackWins":
				return "black";
			case "whiteWins":
				return "white";
			case "bothLose":
				return null;
		}
	},
	scoreState: (state, color) => {
		const outcome = counterRace.outcome(state);
		if (outcome === null) return 0;
		return counterModule.winnerOf(outcome) === color ? 1 : -1;
	},
};

export const ticTacToeModule: GameModule<
	TicTacToeState,
	TicTacToeAction,
	TicTacToeOutcome
> = {
	id: "tictactoe",
	game: ticTacToe,
	createInitialState: createTicTacToeState,
	actionSchema: TicTacToeActionSchema,
	outcomeSchema: TicTacToeOutcomeSchema,
	winnerOf: (outcome) => (outcome.kind === "win" ? outcome.winner : null),
	scoreState: (state, color) => {
		const outcome = ticTacToe.outcome(state);
		if (outcome === null || outcome.kind === "draw") return 0;
		return outcome.winner === color ? 1 : -1;
	},
};

export const GAME_IDS = ["counter", "tictactoe"] as const;
export type GameId = (typeof GAME_IDS)[number];

export function isGameId(value: unknown): value is GameId {
	return GAME_IDS.some((id) => id === value);
}
