import { Context, Duration, Effect } from "effect";

export class BadStatus {
  readonly _tag = "BadStatus";
  constructor(readonly status: number) {}
}

export class FetchError {
  readonly _tag = "FetchError";
  constructor(readonly underlying: unknown) {}
}

export class RequestTimeout {
  readonly _tag = "RequestTimeout";
  constructor(readonly after: Duration.Duration) {}
}

/** `blocked` is undefined when the API answered the batch but left the domain out. */
export type DomainStatus = Readonly<{ domain: string; blocked: boolean | undefined }>;

export type BatchResult =
  | Readonly<{ _tag: "Checked"; statuses: readonly DomainStatus[] }>
  | Readonly<{ _tag: "Failed"; domains: readonly string[]; reason: string }>;

export type CheckReport = Readonly<{ batches: readonly BatchResult[] }>;

export type CheckerFuncs = Readonly<{
  check: (domains: readonly string[]) => Effect.Effect<CheckReport>;
}>;

export class Checker extends Context.Tag("Checker")<Checker, CheckerFuncs>() {}
