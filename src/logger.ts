/** The slice of `console` that long-running components write to. */
export type Logger = Pick<Console, "log" | "warn" | "error">;
