import { readFileSync, writeFileSync } from "node:fs";
import {
	counterModule,
	type GameId,
	type GameModule,
	isGameId,
	ticTacToeModule,
} from "@turnloop/games";
import minimist from "minimist";
import { type AgentKind, isAgentKind, makeAgent } from "./agents";
import { playMatch, replayMatch } from "./match";
import { parseMatchLog } from "./matchLog";
import { log, setLogLevel } from "./obs/log";
import { deriveSeed, mulberry32 } from "./rng";
import {
	createSimulationOptions,
	optionsFromEnv,
	type SimulationOptions,
} from "./simulation/config";
import { runTournament } from "./tournament";

type Args = ReturnType<typeof minimist>;

async function main() {
	const argv: Args = minimist(process.argv.slice(2), {
		boolean: ["verbose", "record", "autofix", "swap"],
		default: { swap: true },
	});
	const cmd = argv._[0];

	const options = createSimulationOptions({
		...optionsFromEnv(process.env),
		...flagOverrides(argv),
	});
	setLogLevel(options.logLevel);

	const gameId = str(argv.game, "counter");
	if (!isGameId(gameId)) {
		throw new Error(`Unknown --game "${gameId}" (counter, tictactoe)`);
	}

	switch (cmd) {
		case "single":
		case "tourney":
		case "replay":
			withModule(gameId, (module) => run(cmd, module, argv, options));
			return;
	}

	console.error("Usage:");
	console.error(
		"  tsx src/cli.ts single  --game counter --black greedy --white random --seed 1 --maxTurns 200 --verbose --record --out match.json",
	);
	console.error(
		"  tsx src/cli.ts tourney --game tictactoe --a greedy --b random --games 200 --seed 1",
	);
	console.error("  tsx src/cli.ts replay  --game counter --file match.json");
	process.exit(1);
}

function withModule(
	id: GameId,
	fn: <S, A, O>(module: GameModule<S, A, O>) => void,
): void {
	switch (id) {
		case "counter":
			return fn(counterModule);
		case "tictactoe":
			return fn(ticTacToeModule);
	}
}

function run<S, A, O>(
	cmd: "single" | "tourney" | "replay",
	module: GameModule<S, A, O>,
	argv: Args,
	options: SimulationOptions,
): void {
	if (cmd === "single") {
		const black = agentKind(argv.black, "greedy");
		const white = agentKind(argv.white, "random");
		const result = playMatch({
			module,
			players: {
				black: makeAgent(
					black,
					module,
					mulberry32(deriveSeed(options.seed, 1)),
				),
				white: makeAgent(
					white,
					module,
					mulberry32(deriveSeed(options.seed, 2)),
				),
			},
			seed: options.seed,
			maxTurns: options.maxTurns,
			verbose: !!argv.verbose,
			record: !!argv.record || typeof argv.out === "string",
			autofixIllegal: options.autofixIllegal,
		});
		if (typeof argv.out === "string" && result.log) {
			writeFileSync(argv.out, JSON.stringify(result.log, null, 2));
			log("info", "match log written", { file: argv.out });
		}
		console.log(JSON.stringify(result, null, 2));
		return;
	}

	if (cmd === "tourney") {
		const a = agentKind(argv.a, "greedy");
		const b = agentKind(argv.b, "random");
		const { summary } = runTournament({
			module,
			entrants: [
				{
					id: `A:${a}`,
					create: (seed) => makeAgent(a, module, mulberry32(seed)),
				},
				{
					id: `B:${b}`,
					create: (seed) => makeAgent(b, module, mulberry32(seed)),
				},
			],
			games: options.games,
			seed: options.seed,
			maxTurns: options.maxTurns,
			swapSeats: options.swapSeats,
			autofixIllegal: options.autofixIllegal,
		});
		console.log(JSON.stringify(summary, null, 2));
		console.log(
			`games=${summary.games} avgTurns=${summary.avgTurns} draws=${summary.draws} unfinished=${summary.unfinished} illegalMoveRate=${summary.illegalMoveRate}`,
		);
		return;
	}

	const file = str(argv.file, "");
	if (!file) throw new Error("replay requires --file <match.json>");
	const matchLog = parseMatchLog(
		module,
		JSON.parse(readFileSync(file, "utf8")),
	);
	const replay = replayMatch(module, matchLog);
	console.log(JSON.stringify(replay, null, 2));
	if (!replay.ok) process.exit(1);
}

function flagOverrides(argv: Args): Partial<SimulationOptions> {
	const out: Partial<SimulationOptions> = {};
	const seed = num(argv.seed);
	if (seed !== undefined) out.seed = seed;
	const maxTurns = num(argv.maxTurns);
	if (maxTurns !== undefined) out.maxTurns = maxTurns;
	const games = num(argv.games);
	if (games !== undefined) out.games = games;
	if (argv.autofix) out.autofixIllegal = true;
	if (argv.swap === false) out.swapSeats = false;
	return out;
}

function agentKind(v: unknown, def: AgentKind): AgentKind {
	if (v === undefined) return def;
	if (!isAgentKind(v)) throw new Error(`Unknown agent "${String(v)}"`);
	return v;
}

function num(v: unknown): number | undefined {
	const n = typeof v === "string" ? Number(v) : typeof v === "number" ? v : NaN;
	return Number.isFinite(n) ? n : undefined;
}

function str(v: unknown, def: string): string {
	return typeof v === "string" ? v : def;
}

main().catch((e) => {
	log("error", "sim failed", {
		error: e instanceof Error ? e.message : String(e),
	});
	process.exit(1);
});
