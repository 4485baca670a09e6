export type PlayerColor = "black" | "white";

export const PLAYER_COLORS: readonly PlayerColor[] = ["black", "white"];

export function opponentOf(color: PlayerColor): PlayerColor {
	return color === "black" ? "white" : "black";
}

/** Black sorts before white. Only meaningful for ordering seats. */
export function compareColors(a: PlayerColor, b: PlayerColor): number {
	return PLAYER_COLORS.indexOf(a) - PLAYER_COLORS.indexOf(b);
}

export function isPlayerColor(value: unknown): value is PlayerColor {
	return value === "black" || value === "white";
}
