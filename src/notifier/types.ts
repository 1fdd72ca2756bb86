import { Context, Effect } from "effect";

export class DeliveryError {
  readonly _tag = "DeliveryError";
  constructor(readonly underlying: unknown) {}
}

export type NotifierFuncs = Readonly<{
  notify: (text: string) => Effect.Effect<void>;
}>;

export class Notifier extends Context.Tag("Notifier")<Notifier, NotifierFuncs>() {}
