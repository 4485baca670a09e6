import { isDeepStrictEqual } from "node:util";
import type { PlayerColor } from "./color";

/**
 * The functions a concrete game supplies. States are plain values owned by
 * whoever holds them; `makeNext` advances one in place.
 */
export type GameRules<S, A, O> = {
	name: string;
	clone: (state: Readonly<S>) => S;
	/** Precondition: `action` is one `legalActions(state)` currently lists. */
	makeNext: (state: S, action: A) => void;
	/** Empty only once `outcome(state)` is non-null. */
	legalActions: (state: Readonly<S>) => A[];
	currentPlayerTurn: (state: Readonly<S>) => PlayerColor;
	/** `null` while undecided; the sole termination signal. */
	outcome: (state: Readonly<S>) => O | null;
	isFinal: (outcome: O) => boolean;
	actionsEqual?: (a: A, b: A) => boolean;
	describeAction?: (action: A) => string;
};

/**
 * Binds one state type, one action type and one outcome type together so
 * agents and the runner can be written once for every game.
 */
export type Game<S, A, O> = Required<GameRules<S, A, O>> & {
	/** Pure counterpart of `makeNext`: clones, advances the clone, returns it. */
	next: (state: Readonly<S>, action: A) => S;
};

export function defineGame<S, A, O>(
	rules: GameRules<S, A, O>,
): Game<S, A, O> {
	const game: Game<S, A, O> = {
		...rules,
		actionsEqual: rules.actionsEqual ?? sameAction,
		describeAction: rules.describeAction ?? describeValue,
		next: (state, action) => {
			const next = game.clone(state);
			game.makeNext(next, action);
			return next;
		},
	};
	return game;
}

/** Deep structural equality; key order is ignored, `Set` and `Map` contents are not. */
export function sameAction(a: unknown, b: unknown): boolean {
	return isDeepStrictEqual(a, b);
}

export function isLegalAction<S, A, O>(
	game: Game<S, A, O>,
	legal: readonly A[],
	action: A,
): boolean {
	return legal.some(
		(candidate) =>
			candidate === action || game.actionsEqual(candidate, action),
	);
}

function describeValue(value: unknown): string {
	const s = safeJson(value);
	return s.length > 140 ? `${s.slice(0, 140)}…` : s;
}

function safeJson(x: unknown): string {
	try {
		return JSON.stringify(x) ?? String(x);
	} catch {
		return String(x);
	}
}
