import {
	defineGame,
	IllegalActionError,
	opponentOf,
	type PlayerColor,
} from "@turnloop/engine";
import { z } from "zod";

export type Mark = PlayerColor | null;
export type Line = readonly [number, number, number];

export type TicTacToeState = {
	board: Mark[];
	toMove: PlayerColor;
};

export type TicTacToeAction = { cell: number };

export type TicTacToeOutcome =
	| { kind: "win"; winner: PlayerColor; line: [number, number, number] }
	| { kind: "draw" };

export const TicTacToeActionSchema = z.object({
	cell: z.number().int().min(0).max(8),
});

export const TicTacToeOutcomeSchema = z.discriminatedUnion("kind", [
	z.object({
		kind: z.literal("win"),
		winner: z.enum(["black", "white"]),
		line: z.tuple([z.number(), z.number(), z.number()]),
	}),
	z.object({ kind: z.literal("draw") }),
]);

const LINES: readonly Line[] = [
	[0, 1, 2],
	[3, 4, 5],
	[6, 7, 8],
	[0, 3, 6],
	[1, 4, 7],
	[2, 5, 8],
	[0, 4, 8],
	[2, 4, 6],
];

export function createTicTacToeState(): TicTacToeState {
	return { board: Array<Mark>(9).fill(null), toMove: "black" };
}

/**
 * Builds a position from nine characters, row by row: `B` black, `W`
 * white, `.` empty. Whitespace is ignored. Black moves first, so the side
 * to move follows from the mark counts.
 */
export function parseBoard(layout: string): TicTacToeState {
	const chars = layout.replace(/\s+/g, "").split("");
	if (chars.length !== 9) {
		throw new Error(`Board layout needs 9 cells, got ${chars.length}`);
	}
	const board = chars.map((ch): Mark => {
		switch (ch) {
			case "B":
				return "black";
			case "W":
				return "white";
			case ".":
				return null;
			default:
				throw new Error(`Unknown board cell "${ch}"`);
		}
	});
	const blacks = board.filter((m) => m === "black").length;
	const whites = board.filter((m) => m === "white").length;
	if (blacks !== whites && blacks !== whites + 1) {
		throw new Error(`Unreachable layout: ${blacks} black, ${whites} white`);
	}
	return { board, toMove: blacks === whites ? "black" : "white" };
}

function ticTacToeOutcome(state: TicTacToeState): TicTacToeOutcome | null {
	for (const [a, b, c] of LINES) {
		const mark = state.board[a];
		if (mark && mark === state.board[b] && mark === state.board[c]) {
			return { kind: "win", winner: mark, line: [a, b, c] };
		}
	}
	if (state.board.every((m) => m !== null)) return { kind: "draw" };
	return null;
}

export const ticTacToe = defineGame<
	TicTacToeState,
	TicTacToeAction,
	TicTacToeOutcome
>({
	name: "tic-tac-toe",
	clone: (state) => ({ board: [...state.board], toMove: state.toMove }),
	makeNext: (state, action) => {
		const reject = (reason: string) =>
			new IllegalActionError({ action: `cell ${action.cell}`, reason });
		if (ticTacToeOutcome(state) !== null) {
			throw reject("the game is already decided");
		}
		if (!Number.isInteger(action.cell) || action.cell < 0 || action.cell > 8) {
			throw reject("cells are numbered 0 to 8");
		}
		if (state.board[action.cell] !== null) {
			throw reject("cell is occupied");
		}
		state.board[action.cell] = state.toMove;
		state.toMove = opponentOf(state.toMove);
	},
	legalActions: (state) => {
		if (ticTacToeOutcome(state) !== null) return [];
		const actions: TicTacToeAction[] = [];
		state.board.forEach((mark, cell) => {
			if (mark === null) actions.push({ cell });
		});
		return actions;
	},
	currentPlayerTurn: (state) => state.toMove,
	outcome: ticTacToeOutcome,
	isFinal: () => true,
	actionsEqual: (a, b) => a.cell === b.cell,
	describeAction: (action) => `cell ${action.cell}`,
});
