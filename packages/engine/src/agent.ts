/**
 * A seat's decision policy. `state` is lent for the duration of the call;
 * `actions` is the non-empty legal set the runner computed for it.
 */
export type Agent<S, A> = {
	name: string;
	pickAction: (state: Readonly<S>, actions: readonly A[]) => A;
};
