import type { Agent } from "@turnloop/engine";

/** Always takes the first offered action. */
export function makeFirstActionAgent<S, A>(): Agent<S, A> {
	return {
		name: "FirstActionAgent",
		pickAction: (_state, actions) => {
			const first = actions[0];
			if (first === undefined) throw new Error("no actions offered");
			return first;
		},
	};
}
