import { describe, expect, test } from "vitest";
import {
	compareColors,
	isPlayerColor,
	opponentOf,
	PLAYER_COLORS,
	type PlayerColor,
} from "../src";

describe("PlayerColor", () => {
	test("there are exactly two seats", () => {
		expect(PLAYER_COLORS).toEqual(["black", "white"]);
	});

	test("opponentOf swaps seats", () => {
		expect(opponentOf("black")).toBe("white");
		expect(opponentOf("white")).toBe("black");
	});

	test("black orders before white", () => {
		const colors: PlayerColor[] = ["white", "black", "white"];
		expect([...colors].sort(compareColors)).toEqual([
			"black",
			"white",
			"white",
		]);
		expect(compareColors("black", "black")).toBe(0);
	});

	test("isPlayerColor only accepts the two seats", () => {
		expect(isPlayerColor("black")).toBe(true);
		expect(isPlayerColor("red")).toBe(false);
		expect(isPlayerColor(undefined)).toBe(false);
	});
});
