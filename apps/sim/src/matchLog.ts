import { z } from "zod";
import type { GameModule, MatchLog } from "./types";

const MatchLogEnvelopeSchema = z.object({
	game: z.string().min(1),
	seed: z.number().int(),
	players: z.object({ black: z.string(), white: z.string() }),
	turns: z.array(
		z.object({
			turn: z.number().int().positive(),
			color: z.enum(["black", "white"]),
			action: z.unknown(),
		}),
	),
	outcome: z.unknown(),
});

const formatIssues = (error: z.ZodError) =>
	error.errors.map((e) => `${e.path.join(".")}: ${e.message}`).join("; ");

/**
 * Validates a recorded match against the module's action and outcome
 * schemas. Throws with the joined zod issues when the log does not fit.
 */
export function parseMatchLog<S, A, O>(
	module: GameModule<S, A, O>,
	raw: unknown,
): MatchLog<A, O> {
	const envelope = MatchLogEnvelopeSchema.safeParse(raw);
	if (!envelope.success) {
		throw new Error(`Invalid match log: ${formatIssues(envelope.error)}`);
	}
	const { data } = envelope;
	if (data.game !== module.id) {
		throw new Error(
			`Match log is for game "${data.game}", expected "${module.id}"`,
		);
	}

	const turns = data.turns.map((entry, i) => {
		const action = module.actionSchema.safeParse(entry.action);
		if (!action.success) {
			throw new Error(
				`Invalid action at turn index ${i}: ${formatIssues(action.error)}`,
			);
		}
		return { turn: entry.turn, color: entry.color, action: action.data };
	});

	const outcome = module.outcomeSchema
		.nullable()
		.safeParse(data.outcome ?? null);
	if (!outcome.success) {
		throw new Error(`Invalid outcome: ${formatIssues(outcome.error)}`);
	}

	return {
		game: data.game,
		seed: data.seed,
		players: data.players,
		turns,
		outcome: outcome.data,
	};
}
