import type { Agent, Game, PlayerColor } from "@turnloop/engine";
import { pickOne, type Rng } from "../rng";

/**
 * One-ply greedy agent: scores the position each action leads to from the
 * mover's point of view and picks among the best, ties broken by `rng`.
 */
export function makeGreedyAgent<S, A, O>(opts: {
	game: Game<S, A, O>;
	score: (state: S, color: PlayerColor) => number;
	rng: Rng;
}): Agent<S, A> {
	const { game, score, rng } = opts;
	return {
		name: "GreedyAgent",
		pickAction: (state, actions) => {
			const color = game.currentPlayerTurn(state);
			let bestScore = Number.NEGATIVE_INFINITY;
			let best: A[] = [];
			for (const action of actions) {
				const s = score(game.next(state, action), color);
				if (s > bestScore) {
					bestScore = s;
					best = [action];
				} else if (s === bestScore) {
					best.push(action);
				}
			}
			return pickOne(best.length ? best : actions, rng);
		},
	};
}
