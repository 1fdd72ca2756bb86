import { Context, Effect, Scope } from "effect";

export type SchedulerFuncs = Readonly<{ start: Effect.Effect<void, never, Scope.Scope> }>;

export class Scheduler extends Context.Tag("Scheduler")<Scheduler, SchedulerFuncs>() {}
