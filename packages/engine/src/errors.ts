export type ContractViolation =
	| "stalled"
	| "illegal_action"
	| "runner_consumed"
	| "turn_limit"
	| "aborted";

/**
 * Raised when a game or an agent breaks the engine contract. The engine
 * never recovers from these; callers decide what a broken match means.
 */
export class GameContractError extends Error {
	readonly code: ContractViolation;
	readonly turn: number | undefined;

	constructor(code: ContractViolation, message: string, turn?: number) {
		super(message);
		this.name = "GameContractError";
		this.code = code;
		this.turn = turn;
	}
}

/** No legal actions while the outcome is still undecided. */
export class StalledGameError extends GameContractError {
	constructor(turn?: number) {
		super(
			"stalled",
			"legalActions returned an empty list while the game is undecided",
			turn,
		);
		this.name = "StalledGameError";
	}
}

export class IllegalActionError extends GameContractError {
	readonly action: string;
	readonly agent: string | undefined;

	constructor(opts: {
		action: string;
		reason: string;
		agent?: string;
		turn?: number;
	}) {
		const by = opts.agent ? ` from ${opts.agent}` : "";
		super(
			"illegal_action",
			`illegal action ${opts.action}${by}: ${opts.reason}`,
			opts.turn,
		);
		this.name = "IllegalActionError";
		this.action = opts.action;
		this.agent = opts.agent;
	}
}

export class RunnerConsumedError extends GameContractError {
	constructor() {
		super("runner_consumed", "GameRunner.play may only be called once");
		this.name = "RunnerConsumedError";
	}
}

export class TurnLimitError extends GameContractError {
	readonly maxTurns: number;

	constructor(maxTurns: number, turn: number) {
		super("turn_limit", `no outcome after ${maxTurns} turns`, turn);
		this.name = "TurnLimitError";
		this.maxTurns = maxTurns;
	}
}

export class MatchAbortedError extends GameContractError {
	constructor(turn: number) {
		super("aborted", `match aborted before turn ${turn}`, turn);
		this.name = "MatchAbortedError";
	}
}
