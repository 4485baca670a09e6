import {
	counterModule,
	type TicTacToeAction,
	type TicTacToeState,
	ticTacToeModule,
} from "@turnloop/games";
import { describe, expect, test } from "vitest";
import { makeFirstActionAgent } from "../src/agents";
import { playMatch } from "../src/match";
import { parseMatchLog } from "../src/matchLog";

const first = () => makeFirstActionAgent<TicTacToeState, TicTacToeAction>();

function recordedTicTacToe() {
	const { log } = playMatch({
		module: ticTacToeModule,
		players: { black: first(), white: first() },
		seed: 3,
		maxTurns: 20,
		record: true,
	});
	if (!log) throw new Error("expected a log");
	return log;
}

describe("parseMatchLog", () => {
	test("round-trips a recorded match through JSON", () => {
		const log = recordedTicTacToe();
		const parsed = parseMatchLog(
			ticTacToeModule,
			JSON.parse(JSON.stringify(log)),
		);
		expect(parsed).toEqual(log);
	});

	test("rejects a log for another game", () => {
		expect(() => parseMatchLog(counterModule, recordedTicTacToe())).toThrow(
			'Match log is for game "tictactoe", expected "counter"',
		);
	});

	test("rejects actions the game's schema does not accept", () => {
		const log = recordedTicTacToe();
		const raw = {
			...log,
			turns: [{ turn: 1, color: "black", action: { cell: 12 } }],
		};
		expect(() => parseMatchLog(ticTacToeModule, raw)).toThrow(
			"Invalid action at turn index 0",
		);
	});

	test("rejects a malformed envelope", () => {
		expect(() =>
			parseMatchLog(ticTacToeModule, { game: "tictactoe", seed: "x" }),
		).toThrow("Invalid match log");
	});
});
