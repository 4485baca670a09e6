export * from "./counter";
export * from "./registry";
export * from "./tictactoe";
