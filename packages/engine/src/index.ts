export type { Agent } from "./agent";
export {
	compareColors,
	isPlayerColor,
	opponentOf,
	PLAYER_COLORS,
	type PlayerColor,
} from "./color";
export {
	type ContractViolation,
	GameContractError,
	IllegalActionError,
	MatchAbortedError,
	RunnerConsumedError,
	StalledGameError,
	TurnLimitError,
} from "./errors";
export {
	defineGame,
	type Game,
	type GameRules,
	isLegalAction,
	sameAction,
} from "./game";
export {
	type GameRecord,
	GameRunner,
	type RunnerOptions,
	type Seats,
	type TurnRecord,
} from "./runner";
