import { Duration, Effect, Layer, pipe } from "effect";
import { Config } from "../config";
import { Monitor, MonitorFuncs } from "../monitor";
import { Scheduler } from "./types";

// fixed interval, first tick one interval after start; a missed tick is not caught up
const tick = (interval: Duration.Duration, monitor: MonitorFuncs) =>
  pipe(
    monitor.submit("scheduled"),
    Effect.delay(interval),
    Effect.forever,
    Effect.forkScoped,
    Effect.tap(() => Effect.logInfo(`scheduled checks every ${Duration.format(interval)}`)),
    Effect.asVoid,
  );

export const SchedulerLive = Layer.effect(
  Scheduler,
  Effect.Do.pipe(
    Effect.bind("c", () => Config),
    Effect.bind("config", ({ c }) => c.getConfig),
    Effect.bind("monitor", () => Monitor),
    Effect.map(({ config, monitor }) => Scheduler.of({ start: tick(config.checkInterval, monitor) })),
  ),
);

export const forTesting = { tick };
