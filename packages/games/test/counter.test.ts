import {
	type Agent,
	type Game,
	type GameRecord,
	GameRunner,
	IllegalActionError,
} from "@turnloop/engine";
import { describe, expect, expectTypeOf, test, vi } from "vitest";
import {
	type CounterAction,
	CounterActionSchema,
	type CounterOutcome,
	type CounterState,
	counterModule,
	counterRace,
	createCounterState,
} from "../src";

const first: Agent<CounterState, CounterAction> = {
	name: "first",
	pickAction: (_state, actions) => {
		const action = actions[0];
		if (!action) throw new Error("no actions");
		return action;
	},
};

function reachableStates(alternate: boolean): CounterState[] {
	const seen = new Map<string, CounterState>();
	const queue = [createCounterState({ alternate })];
	while (queue.length > 0) {
		const state = queue.shift();
		if (!state) break;
		const key = `${state.count}:${state.toMove}`;
		if (seen.has(key)) continue;
		seen.set(key, state);
		for (const action of counterRace.legalActions(state)) {
			queue.push(counterRace.next(state, action));
		}
	}
	return [...seen.values()];
}

describe("counter race", () => {
	test("always bumping by two lands on 42 after 21 turns", () => {
		const counts: number[] = [];
		const watcher: Agent<CounterState, CounterAction> = {
			name: "watcher",
			pickAction: (state, actions) => {
				counts.push(state.count);
				return first.pickAction(state, actions);
			},
		};

		const record = new GameRunner(
			counterRace,
			{ black: watcher, white: watcher },
			createCounterState(),
		).play();

		expect(record.turns).toBe(21);
		expect(record.finalState.count).toBe(42);
		expect(counts).toHaveLength(21);
		expect(counts.slice(0, 4)).toEqual([0, 2, 4, 6]);
		expect(counts.at(-1)).toBe(40);
		// 21 hand-overs from black leave white to move at 42.
		expect(record.finalState.toMove).toBe("white");
		expect(record.outcome).toBe("whiteWins");
	});

	test("without alternation black keeps the turn and wins at 42", () => {
		const record = new GameRunner(
			counterRace,
			{ black: first, white: first },
			createCounterState({ alternate: false }),
		).play();

		expect(record.turns).toBe(21);
		expect(record.outcome).toBe("blackWins");
	});

	test("passing the target makes both sides lose", () => {
		const state = createCounterState({ count: 41 });
		expect(counterRace.outcome(state)).toBeNull();
		expect(counterRace.legalActions(state)).toEqual([
			{ bump: 2 },
			{ bump: 3 },
			{ bump: 4 },
		]);

		counterRace.makeNext(state, { bump: 2 });

		expect(state.count).toBe(43);
		expect(counterRace.outcome(state)).toBe("bothLose");
		expect(counterRace.legalActions(state)).toEqual([]);
	});

	test("a race that starts decided never asks an agent", () => {
		const pickAction = vi.fn(first.pickAction);
		const spy = { name: "spy", pickAction };

		const record = new GameRunner(
			counterRace,
			{ black: spy, white: spy },
			createCounterState({ count: 42 }),
		).play();

		expect(pickAction).not.toHaveBeenCalled();
		expect(record.turns).toBe(0);
		expect(record.outcome).toBe("blackWins");
	});

	test("makeNext rejects moves on a decided race and unknown bumps", () => {
		const decided = createCounterState({ count: 44 });
		expect(() => counterRace.makeNext(decided, { bump: 2 })).toThrow(
			IllegalActionError,
		);

		const bogus = { bump: 5 } as unknown as CounterAction;
		expect(() => counterRace.makeNext(createCounterState(), bogus)).toThrow(
			"bumps must be one of 2, 3, 4",
		);
	});

	test("every undecided reachable state offers an action", () => {
		for (const alternate of [true, false]) {
			for (const state of reachableStates(alternate)) {
				const decided = counterRace.outcome(state) !== null;
				expect(counterRace.legalActions(state).length === 0).toBe(decided);
			}
		}
	});

	test("next matches clone + makeNext and leaves the receiver alone", () => {
		for (const state of reachableStates(true)) {
			const before = { ...state };
			for (const action of counterRace.legalActions(state)) {
				const copy = counterRace.clone(state);
				counterRace.makeNext(copy, action);
				expect(counterRace.next(state, action)).toEqual(copy);
				expect(state).toEqual(before);
			}
		}
	});

	test("outcomes are final and map to winners", () => {
		expect(counterRace.isFinal("bothLose")).toBe(true);
		expect(counterModule.winnerOf("blackWins")).toBe("black");
		expect(counterModule.winnerOf("whiteWins")).toBe("white");
		expect(counterModule.winnerOf("bothLose")).toBeNull();
	});

	test("scoreState rates a position from one color's side", () => {
		const won = createCounterState({ count: 42, toMove: "white" });
		expect(counterModule.scoreState(won, "white")).toBe(1);
		expect(counterModule.scoreState(won, "black")).toBe(-1);
		expect(counterModule.scoreState(createCounterState(), "black")).toBe(0);
	});

	test("action schema accepts only the three bumps", () => {
		expect(CounterActionSchema.safeParse({ bump: 3 }).success).toBe(true);
		expect(CounterActionSchema.safeParse({ bump: 5 }).success).toBe(false);
		expect(CounterActionSchema.safeParse({}).success).toBe(false);
	});
});

describe("counterRace types", () => {
	test("the game value carries its state, action and outcome types", () => {
		expectTypeOf(counterRace).toEqualTypeOf<
			Game<CounterState, CounterAction, CounterOutcome>
		>();
	});

	test("the runner infers its record type from the game", () => {
		const record = new GameRunner(
			counterRace,
			{ black: first, white: first },
			createCounterState(),
		).play();

		expectTypeOf(record).toEqualTypeOf<
			GameRecord<CounterState, CounterOutcome>
		>();
		expect(record.outcome).toBe("whiteWins");
	});
});
