import { Context, Effect, Option } from "effect";

export type InboundMessage = Readonly<{
  chatId: number;
  text: string;
  /** This bot's username; commands mentioning another bot are ignored when set. */
  botUsername?: string;
}>;

export type CommandsFuncs = Readonly<{
  /** The reply for the trusted chat, or none when the message is ignored. */
  handle: (message: InboundMessage) => Effect.Effect<Option.Option<string>>;
}>;

export class Commands extends Context.Tag("Commands")<Commands, CommandsFuncs>() {}
