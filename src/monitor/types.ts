import { Context, Effect } from "effect";

export type Trigger = "scheduled" | "manual";

export type MonitorFuncs = Readonly<{
  /** One full check operation: read the list, check every batch, send the report. */
  runCheck: Effect.Effect<void>;
  /** Queues a check for the single worker. False when one is already waiting. */
  submit: (trigger: Trigger) => Effect.Effect<boolean>;
}>;

export class Monitor extends Context.Tag("Monitor")<Monitor, MonitorFuncs>() {}
