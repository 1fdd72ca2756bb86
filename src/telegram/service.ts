import { Context, Effect, Layer, pipe, Redacted } from "effect";
import { Bot } from "grammy";
import { Config } from "../config";

export class TelegramBot extends Context.Tag("TelegramBot")<TelegramBot, Bot>() {}

// no network until the server calls init(), so building the layer never fails on a bad token
export const TelegramBotLive = Layer.effect(
  TelegramBot,
  pipe(
    Config,
    Effect.andThen(c => c.getConfig),
    Effect.map(({ botToken }) => new Bot(Redacted.value(botToken))),
  ),
);
