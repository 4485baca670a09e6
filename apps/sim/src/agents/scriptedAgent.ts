import type { Agent } from "@turnloop/engine";

/**
 * Plays a fixed list of actions in order, then throws. Useful for pinning
 * down positions in tests and for replaying a seat.
 */
export function makeScriptedAgent<S, A>(
	script: readonly A[],
	name = "ScriptedAgent",
): Agent<S, A> {
	let cursor = 0;
	return {
		name,
		pickAction: () => {
			const action = script[cursor];
			if (action === undefined) {
				throw new Error(`${name} ran out of scripted actions at ${cursor}`);
			}
			cursor++;
			return action;
		},
	};
}
