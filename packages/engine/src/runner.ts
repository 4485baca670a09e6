import type { Agent } from "./agent";
import type { PlayerColor } from "./color";
import {
	IllegalActionError,
	MatchAbortedError,
	RunnerConsumedError,
	StalledGameError,
	TurnLimitError,
} from "./errors";
import { type Game, isLegalAction } from "./game";

export type Seats<S, A> = Record<PlayerColor, Agent<S, A>>;

export type TurnRecord<A> = {
	turn: number;
	color: PlayerColor;
	action: A;
	agent: string;
};

export type RunnerOptions<A> = {
	/** Reject agent picks that are not in the offered set. Default true. */
	validateActions?: boolean;
	maxTurns?: number;
	signal?: AbortSignal;
	onTurn?: (record: TurnRecord<A>) => void;
};

export type GameRecord<S, O> = {
	outcome: O;
	finalState: S;
	turns: number;
};

/**
 * Drives one match between two agents. The runner takes the start state as
 * its own and advances it in place; it can be played exactly once.
 */
export class GameRunner<S, A, O> {
	private readonly game: Game<S, A, O>;
	private readonly seats: Seats<S, A>;
	private readonly state: S;
	private readonly options: RunnerOptions<A>;
	private consumed = false;

	constructor(
		game: Game<S, A, O>,
		seats: Seats<S, A>,
		startState: S,
		options: RunnerOptions<A> = {},
	) {
		this.game = game;
		this.seats = seats;
		this.state = startState;
		this.options = options;
	}

	play(): GameRecord<S, O> {
		if (this.consumed) throw new RunnerConsumedError();
		this.consumed = true;

		const { game, state, options } = this;
		const validate = options.validateActions ?? true;
		let turns = 0;

		for (;;) {
			const outcome = game.outcome(state);
			if (outcome !== null) {
				return { outcome, finalState: state, turns };
			}

			const turn = turns + 1;
			if (options.signal?.aborted) throw new MatchAbortedError(turn);
			if (options.maxTurns !== undefined && turns >= options.maxTurns) {
				throw new TurnLimitError(options.maxTurns, turn);
			}

			const color = game.currentPlayerTurn(state);
			const agent = this.seats[color];
			const legal = game.legalActions(state);
			if (legal.length === 0) throw new StalledGameError(turn);

			const action = agent.pickAction(state, legal);
			if (validate && !isLegalAction(game, legal, action)) {
				throw new IllegalActionError({
					action: game.describeAction(action),
					reason: "not among the offered legal actions",
					agent: agent.name,
					turn,
				});
			}

			game.makeNext(state, action);
			turns = turn;
			options.onTurn?.({ turn, color, action, agent: agent.name });
		}
	}
}
