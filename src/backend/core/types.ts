/**
 * Coordinator lifecycle.
 *
 * `idle` -> `running` <-> `installing` -> `shutting_down` -> `stopped`.
 * Polling continues in both `running` and `installing`.
 */
export type CoordinatorState = "idle" | "running" | "installing" | "shutting_down" | "stopped";
