import type { Agent } from "@turnloop/engine";
import { pickOne, type Rng } from "../rng";

export function makeRandomAgent<S, A>(rng: Rng): Agent<S, A> {
	return {
		name: "RandomAgent",
		pickAction: (_state, actions) => pickOne(actions, rng),
	};
}
