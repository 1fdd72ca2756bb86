import { Deferred, Effect, Queue, Ref } from "effect";
import { CheckerFuncs, CheckReport } from "../checker";
import { DomainStoreFuncs, StorageError } from "../domains";
import { NotifierFuncs } from "../notifier";
import { forTesting } from "./service";

const { makeMonitor, makeRunCheck } = forTesting;

const fakeStore = (list: DomainStoreFuncs["list"]): DomainStoreFuncs => ({
  list,
  add: () => Effect.void,
  remove: () => Effect.void,
});

const recordingNotifier = (sent: Ref.Ref<readonly string[]>): NotifierFuncs => ({
  notify: text => Ref.update(sent, s => [...s, text]),
});

describe("monitor", () => {
  it("runCheck sends the formatted report for the stored domains", () =>
    Effect.gen(function* () {
      const sent = yield* Ref.make<readonly string[]>([]);
      const checked = yield* Ref.make<readonly string[]>([]);
      const checker: CheckerFuncs = {
        check: domains =>
          Ref.set(checked, domains).pipe(
            Effect.as<CheckReport>({
              batches: [
                {
                  _tag: "Checked",
                  statuses: [
                    { domain: "a.com", blocked: true },
                    { domain: "b.com", blocked: false },
                  ],
                },
              ],
            }),
          ),
      };

      yield* makeRunCheck(fakeStore(Effect.succeed(["a.com", "b.com"])), checker, recordingNotifier(sent));

      expect(yield* Ref.get(checked)).toEqual(["a.com", "b.com"]);
      expect(yield* Ref.get(sent)).toEqual(["📄 Domain Check Results:\n\na.com: 🚫 BLOCKED\nb.com: ✅ Not Blocked"]);
    }).pipe(Effect.runPromise));

  it("runCheck reports a storage failure to the chat", () =>
    Effect.gen(function* () {
      const sent = yield* Ref.make<readonly string[]>([]);
      const checker: CheckerFuncs = { check: () => Effect.die("should not be called") };

      yield* makeRunCheck(
        fakeStore(Effect.fail(new StorageError("read", new Error("EACCES: permission denied")))),
        checker,
        recordingNotifier(sent),
      );

      expect(yield* Ref.get(sent)).toEqual(["🚨 Error reading domain list: EACCES: permission denied"]);
    }).pipe(Effect.runPromise));

  it("runs submitted checks on a single worker", () =>
    Effect.gen(function* () {
      const started = yield* Queue.unbounded<number>();
      const finished = yield* Queue.unbounded<number>();
      const gate = yield* Deferred.make<void>();
      const runs = yield* Ref.make(0);
      const active = yield* Ref.make(0);
      const maxActive = yield* Ref.make(0);

      const runCheck = Effect.gen(function* () {
        const run = yield* Ref.updateAndGet(runs, n => n + 1);
        const now = yield* Ref.updateAndGet(active, n => n + 1);
        yield* Ref.update(maxActive, m => Math.max(m, now));
        yield* Queue.offer(started, run);
        yield* Deferred.await(gate);
        yield* Ref.update(active, n => n - 1);
        yield* Queue.offer(finished, run);
      });

      const monitor = yield* makeMonitor(runCheck);

      expect(yield* monitor.submit("scheduled")).toBe(true);
      expect(yield* Queue.take(started)).toEqual(1);

      // the first check is running and holds the worker
      expect(yield* monitor.submit("manual")).toBe(true);
      expect(yield* monitor.submit("manual")).toBe(false);

      yield* Deferred.succeed(gate, undefined);
      expect(yield* Queue.take(finished)).toEqual(1);
      expect(yield* Queue.take(finished)).toEqual(2);

      expect(yield* Ref.get(runs)).toEqual(2);
      expect(yield* Ref.get(maxActive)).toEqual(1);
    }).pipe(Effect.scoped, Effect.runPromise));

  it("keeps the worker alive after a check dies", () =>
    Effect.gen(function* () {
      const attempts = yield* Queue.unbounded<number>();
      const count = yield* Ref.make(0);
      const runCheck = Ref.updateAndGet(count, n => n + 1).pipe(
        Effect.tap(n => Queue.offer(attempts, n)),
        Effect.andThen(n => (n === 1 ? Effect.die(new Error("boom")) : Effect.void)),
      );

      const monitor = yield* makeMonitor(runCheck);

      yield* monitor.submit("manual");
      expect(yield* Queue.take(attempts)).toEqual(1);
      yield* monitor.submit("manual");
      expect(yield* Queue.take(attempts)).toEqual(2);
    }).pipe(Effect.scoped, Effect.runPromise));
});
