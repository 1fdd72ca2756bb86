import { Effect, Fiber, Layer, Logger, pipe } from "effect";
import { CheckerLive } from "./checker";
import { CommandsLive } from "./commands";
import { ConfigLive, logLevelConfig } from "./config";
import { DomainStoreLive } from "./domains";
import { MonitorLive } from "./monitor";
import { NotifierLive } from "./notifier";
import { SchedulerLive } from "./scheduler";
import { Server, ServerLive } from "./server";
import { TelegramBotLive } from "./telegram";

const program = pipe(
  Server,
  Effect.andThen(s => s.start),
  Effect.scoped,
);

const BaseLive = Layer.mergeAll(TelegramBotLive, DomainStoreLive, CheckerLive).pipe(Layer.provideMerge(ConfigLive));
const NotifyingLive = NotifierLive.pipe(Layer.provideMerge(BaseLive));
const MonitoringLive = MonitorLive.pipe(Layer.provideMerge(NotifyingLive));
const AppLive = ServerLive.pipe(
  Layer.provide(Layer.merge(SchedulerLive, CommandsLive).pipe(Layer.provideMerge(MonitoringLive))),
);

const main = pipe(
  logLevelConfig,
  Effect.andThen(level => program.pipe(Effect.provide(AppLive), Logger.withMinimumLogLevel(level))),
  Effect.tapErrorCause(cause => Effect.logFatal("bot stopped", cause)),
  Effect.catchAllCause(() =>
    Effect.sync(() => {
      process.exitCode = 1;
    }),
  ),
);

const fiber = Effect.runFork(main);

const shutdown = () => {
  void Effect.runPromise(Fiber.interrupt(fiber));
};
process.once("SIGINT", shutdown);
process.once("SIGTERM", shutdown);
