import { Array as Arr, Duration, Effect, Layer, pipe, Schema } from "effect";
import { Config } from "../config";
import { BadStatus, BatchResult, Checker, CheckReport, FetchError, RequestTimeout } from "./types";

const ApiResponse = Schema.parseJson(
  Schema.Record({ key: Schema.String, value: Schema.Struct({ blocked: Schema.Boolean }) }),
);

type CheckOptions = Readonly<{ apiUrl: string; batchSize: number; requestTimeout: Duration.Duration }>;

// the separating commas stay literal; each domain is encoded on its own
const batchUrl = (apiUrl: string, batch: readonly string[]) =>
  `${apiUrl}?domains=${batch.map(encodeURIComponent).join(",")}&json=true`;

const fetchBatch = (url: string, timeout: Duration.Duration) =>
  pipe(
    Effect.tryPromise({
      try: signal => fetch(url, { method: "GET", signal }),
      catch: error => new FetchError(error),
    }),
    Effect.tap(r => (r.status !== 200 ? Effect.fail(new BadStatus(r.status)) : Effect.void)),
    Effect.andThen(r =>
      Effect.tryPromise({
        try: () => r.text(),
        catch: error => new FetchError(error),
      }),
    ),
    Effect.timeoutFail({ duration: timeout, onTimeout: () => new RequestTimeout(timeout) }),
    Effect.andThen(Schema.decodeUnknown(ApiResponse)),
  );

// requested order first, then anything extra the API chose to answer
const toStatuses = (batch: readonly string[], answered: Readonly<Record<string, { readonly blocked: boolean }>>) => [
  ...batch.map(domain => ({ domain, blocked: answered[domain]?.blocked })),
  ...Object.entries(answered)
    .filter(([domain]) => !batch.includes(domain))
    .map(([domain, { blocked }]) => ({ domain, blocked })),
];

const describeFetchError = (underlying: unknown) =>
  underlying instanceof Error ? underlying.message : String(underlying);

const checkBatch = (options: CheckOptions, batch: readonly string[]): Effect.Effect<BatchResult> => {
  const failed = (reason: string): BatchResult => ({ _tag: "Failed", domains: batch, reason });

  return pipe(
    fetchBatch(batchUrl(options.apiUrl, batch), options.requestTimeout),
    Effect.map((answered): BatchResult => ({ _tag: "Checked", statuses: toStatuses(batch, answered) })),
    Effect.catchTags({
      BadStatus: e =>
        Effect.logWarning("got a bad status", e.status).pipe(Effect.as(failed(`unexpected HTTP status ${e.status}`))),
      FetchError: e =>
        Effect.logError("got a fetch error", e.underlying).pipe(Effect.as(failed(describeFetchError(e.underlying)))),
      RequestTimeout: e => Effect.succeed(failed(`request timed out after ${Duration.toSeconds(e.after)} seconds`)),
      ParseError: e =>
        Effect.logWarning("malformed API response", e.message).pipe(Effect.as(failed("malformed API response"))),
    }),
  );
};

const check =
  (options: CheckOptions) =>
  (domains: readonly string[]): Effect.Effect<CheckReport> =>
    domains.length === 0
      ? Effect.succeed({ batches: [] })
      : pipe(
          Arr.chunksOf(domains, options.batchSize),
          Effect.forEach(batch => checkBatch(options, batch)),
          Effect.map(batches => ({ batches })),
          Effect.tap(({ batches }) => Effect.logInfo(`checked ${domains.length} domains in ${batches.length} batches`)),
        );

const statusText = (blocked: boolean | undefined) =>
  blocked === undefined ? "❔ No result" : blocked ? "🚫 BLOCKED" : "✅ Not Blocked";

export const formatReport = ({ batches }: CheckReport) =>
  batches.length === 0
    ? "📄 Domain list is empty. Nothing to check."
    : [
        "📄 Domain Check Results:",
        "",
        ...batches.flatMap(b =>
          b._tag === "Checked"
            ? b.statuses.map(s => `${s.domain}: ${statusText(s.blocked)}`)
            : [`🚨 Failed to check batch (${b.domains.length} domains): ${b.reason}`],
        ),
      ].join("\n");

export const CheckerLive = Layer.effect(
  Checker,
  pipe(
    Config,
    Effect.andThen(c => c.getConfig),
    Effect.map(({ apiUrl, batchSize, requestTimeout }) =>
      Checker.of({ check: check({ apiUrl, batchSize, requestTimeout }) }),
    ),
  ),
);

export const forTesting = { batchUrl, check };
