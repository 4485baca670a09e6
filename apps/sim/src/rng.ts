export type Rng = () => number;

export function mulberry32(seed: number): Rng {
	let t = seed >>> 0;
	return () => {
		t += 0x6d2b79f5;
		let x = t;
		x = Math.imul(x ^ (x >>> 15), x | 1);
		x ^= x + Math.imul(x ^ (x >>> 7), x | 61);
		return ((x ^ (x >>> 14)) >>> 0) / 4294967296;
	};
}

export function pickOne<T>(arr: readonly T[], rng: Rng): T {
	const idx = Math.min(Math.floor(rng() * arr.length), arr.length - 1);
	const item = arr[idx];
	if (item === undefined) throw new Error("pickOne called with empty array");
	return item;
}

/** Derives an independent stream seed, e.g. one per seat. */
export function deriveSeed(seed: number, salt: number): number {
	return (Math.imul(seed ^ 0x9e3779b9, 0x85ebca6b) + salt) >>> 0;
}
