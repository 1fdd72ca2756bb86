import { Context, Effect } from "effect";

export class ValidationError {
  readonly _tag = "ValidationError";
  constructor(
    readonly domain: string,
    readonly reason: string,
  ) {}
}

export class DuplicateError {
  readonly _tag = "DuplicateError";
  constructor(readonly domain: string) {}
}

export class NotFoundError {
  readonly _tag = "NotFoundError";
  constructor(readonly domain: string) {}
}

export class StorageError {
  readonly _tag = "StorageError";
  constructor(
    readonly operation: "read" | "write" | "init",
    readonly underlying: unknown,
  ) {}

  get reason(): string {
    return this.underlying instanceof Error ? this.underlying.message : String(this.underlying);
  }
}

export interface DomainStoreFuncs {
  readonly list: Effect.Effect<readonly string[], StorageError>;
  readonly add: (domain: string) => Effect.Effect<void, ValidationError | DuplicateError | StorageError>;
  readonly remove: (domain: string) => Effect.Effect<void, NotFoundError | StorageError>;
}

export class DomainStore extends Context.Tag("DomainStore")<DomainStore, DomainStoreFuncs>() {}
