import {
	defineGame,
	IllegalActionError,
	opponentOf,
	type PlayerColor,
} from "@turnloop/engine";
import { z } from "zod";

// Counter race: players bump a shared counter by 2, 3 or 4. Landing exactly
// on the target wins for the color whose turn it is at that count; passing
// it makes both sides lose.

export const COUNTER_BUMPS = [2, 3, 4] as const;
export const COUNTER_TARGET = 42;

export type CounterBump = (typeof COUNTER_BUMPS)[number];

export type CounterState = {
	count: number;
	target: number;
	toMove: PlayerColor;
	/** Hand the turn to the other color after every move. */
	alternate: boolean;
};

export type CounterAction = { bump: CounterBump };

export type CounterOutcome = "blackWins" | "whiteWins" | "bothLose";

export const CounterActionSchema = z.object({
	bump: z.union([z.literal(2), z.literal(3), z.literal(4)]),
});

export const CounterOutcomeSchema = z.enum([
	"blackWins",
	"whiteWins",
	"bothLose",
]);

export function createCounterState(
	opts: Partial<CounterState> = {},
): CounterState {
	return {
		count: opts.count ?? 0,
		target: opts.target ?? COUNTER_TARGET,
		toMove: opts.toMove ?? "black",
		alternate: opts.alternate ?? true,
	};
}

function counterOutcome(state: CounterState): CounterOutcome | null {
	if (state.count < state.target) return null;
	if (state.count > state.target) return "bothLose";
	return state.toMove === "black" ? "blackWins" : "whiteWins";
}

function isCounterBump(n: number): n is CounterBump {
	return COUNTER_BUMPS.some((bump) => bump === n);
}

export const counterRace = defineGame<
	CounterState,
	CounterAction,
	CounterOutcome
>({
	name: "counter-race",
	clone: (state) => ({ ...state }),
	makeNext: (state, action) => {
		if (counterOutcome(state) !== null) {
			throw new IllegalActionError({
				action: `bump ${action.bump}`,
				reason: "the race is already decided",
			});
		}
		if (!isCounterBump(action.bump)) {
			throw new IllegalActionError({
				action: `bump ${action.bump}`,
				reason: `bumps must be one of ${COUNTER_BUMPS.join(", ")}`,
			});
		}
		state.count += action.bump;
		if (state.alternate) state.toMove = opponentOf(state.toMove);
	},
	legalActions: (state) =>
		counterOutcome(state) === null
			? COUNTER_BUMPS.map((bump) => ({ bump }))
			: [],
	currentPlayerTurn: (state) => state.toMove,
	outcome: counterOutcome,
	isFinal: () => true,
	actionsEqual: (a, b) => a.bump === b.bump,
	describeAction: (action) => `bump ${action.bump}`,
});
