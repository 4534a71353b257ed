export type Logger = Pick<Console, "log" | "error">;
