import { Effect, Layer, pipe, Queue, Scope } from "effect";
import { Checker, CheckerFuncs, formatReport } from "../checker";
import { DomainStore, DomainStoreFuncs } from "../domains";
import { Notifier, NotifierFuncs } from "../notifier";
import { Monitor, MonitorFuncs, Trigger } from "./types";

const makeRunCheck = (store: DomainStoreFuncs, checker: CheckerFuncs, notifier: NotifierFuncs) =>
  pipe(
    store.list,
    Effect.andThen(checker.check),
    Effect.map(formatReport),
    Effect.catchTag("StorageError", e =>
      Effect.logError("failed to read domain list", e.underlying).pipe(
        Effect.as(`🚨 Error reading domain list: ${e.reason}`),
      ),
    ),
    Effect.andThen(notifier.notify),
  );

// capacity one + a single consumer: checks never overlap and at most one waits behind the running one
const makeMonitor = (runCheck: Effect.Effect<void>): Effect.Effect<MonitorFuncs, never, Scope.Scope> =>
  Effect.gen(function* () {
    const pending = yield* Queue.dropping<Trigger>(1);

    yield* pipe(
      Queue.take(pending),
      Effect.andThen(trigger =>
        pipe(
          Effect.logInfo(`running ${trigger} domain check`),
          Effect.andThen(runCheck),
          Effect.catchAllCause(cause => Effect.logError("domain check died", cause)),
          Effect.withLogSpan("check"),
        ),
      ),
      Effect.forever,
      Effect.forkScoped,
    );

    return {
      runCheck,
      submit: (trigger: Trigger) =>
        pipe(
          Queue.offer(pending, trigger),
          Effect.tap(accepted =>
            accepted ? Effect.void : Effect.logInfo(`${trigger} check dropped, one is already queued`),
          ),
        ),
    };
  });

export const MonitorLive = Layer.scoped(
  Monitor,
  Effect.Do.pipe(
    Effect.bind("store", () => DomainStore),
    Effect.bind("checker", () => Checker),
    Effect.bind("notifier", () => Notifier),
    Effect.andThen(({ store, checker, notifier }) => makeMonitor(makeRunCheck(store, checker, notifier))),
    Effect.map(Monitor.of),
  ),
);

export const forTesting = { makeMonitor, makeRunCheck };
