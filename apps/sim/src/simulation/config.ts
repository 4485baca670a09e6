import { z } from "zod";
import { type LogLevel, LogLevelSchema } from "../obs/log";

/** Configuration for simulation parameters */
export interface SimulationOptions {
	/** Number of matches in a tournament */
	games: number;
	/** Maximum turns per match before it is cut off */
	maxTurns: number;
	/** Random seed for deterministic results */
	seed: number;
	/** Swap seats every other game of a tournament */
	swapSeats: boolean;
	/** Replace illegal or crashing picks with a random legal action */
	autofixIllegal: boolean;
	logLevel: LogLevel;
}

/** Schema for validating simulation options */
export const SimulationOptionsSchema = z.object({
	games: z.number().int().positive("games must be a positive number"),
	maxTurns: z.number().int().positive("maxTurns must be a positive number"),
	seed: z.number().int("seed must be an integer"),
	swapSeats: z.boolean(),
	autofixIllegal: z.boolean(),
	logLevel: LogLevelSchema,
});

/** Default configuration values */
export const defaultSimulationOptions: SimulationOptions = {
	games: 100,
	maxTurns: 200,
	seed: 1,
	swapSeats: true,
	autofixIllegal: false,
	logLevel: "info",
};

/**
 * Creates a full SimulationOptions from partial options, applying defaults
 */
export function createSimulationOptions(
	options: Partial<SimulationOptions> = {},
): SimulationOptions {
	const merged = { ...defaultSimulationOptions, ...options };

	const result = SimulationOptionsSchema.safeParse(merged);

	if (!result.success) {
		const errors = result.error.errors
			.map((e) => `${e.path.join(".")}: ${e.message}`)
			.join("; ");
		throw new Error(`Invalid simulation options: ${errors}`);
	}

	return result.data;
}

const numberFromEnv = (value: string | undefined) => {
	if (value === undefined || value.trim() === "") return undefined;
	const n = Number(value);
	return Number.isFinite(n) ? n : undefined;
};

/** Reads SIM_* variables. Unset or unparsable values are left out. */
export function optionsFromEnv(
	env: Record<string, string | undefined>,
): Partial<SimulationOptions> {
	const options: Partial<SimulationOptions> = {};
	const seed = numberFromEnv(env.SIM_SEED);
	if (seed !== undefined) options.seed = seed;
	const maxTurns = numberFromEnv(env.SIM_MAX_TURNS);
	if (maxTurns !== undefined) options.maxTurns = maxTurns;
	const games = numberFromEnv(env.SIM_GAMES);
	if (games !== undefined) options.games = games;
	const level = LogLevelSchema.safeParse(env.SIM_LOG_LEVEL);
	if (level.success) options.logLevel = level.data;
	return options;
}
