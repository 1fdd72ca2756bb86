import { Effect, Layer, pipe } from "effect";
import { Config } from "../config";
import { TelegramBot } from "../telegram";
import { DeliveryError, Notifier, NotifierFuncs } from "./types";

export const MaxMessageLength = 4096;

const chunkLine = (line: string, limit: number): readonly string[] =>
  line.length <= limit
    ? [line]
    : Array.from({ length: Math.ceil(line.length / limit) }, (_, i) => line.slice(i * limit, (i + 1) * limit));

/** Splits on line boundaries so every part fits in one Telegram message; a single oversized line is cut hard. */
export const splitMessage = (text: string, limit = MaxMessageLength): readonly string[] =>
  text
    .split("\n")
    .flatMap(line => chunkLine(line, limit))
    .reduce<readonly string[]>((parts, line) => {
      const last = parts[parts.length - 1];
      return last !== undefined && last.length + 1 + line.length <= limit
        ? [...parts.slice(0, -1), `${last}\n${line}`]
        : [...parts, line];
    }, [])
    .filter(part => part.trim().length > 0);

type Send = (chatId: number, text: string) => Promise<unknown>;

const makeNotifier = (chatId: number, send: Send): NotifierFuncs => ({
  notify: text =>
    pipe(
      splitMessage(text),
      Effect.forEach(
        part =>
          pipe(
            Effect.tryPromise({ try: () => send(chatId, part), catch: error => new DeliveryError(error) }),
            Effect.catchTag("DeliveryError", e => Effect.logError("failed to deliver message", e.underlying)),
          ),
        { discard: true },
      ),
    ),
});

export const NotifierLive = Layer.effect(
  Notifier,
  Effect.Do.pipe(
    Effect.bind("c", () => Config),
    Effect.bind("config", ({ c }) => c.getConfig),
    Effect.bind("bot", () => TelegramBot),
    Effect.map(({ config, bot }) =>
      Notifier.of(makeNotifier(config.adminChatId, (chatId, text) => bot.api.sendMessage(chatId, text))),
    ),
  ),
);

export const forTesting = { makeNotifier };
