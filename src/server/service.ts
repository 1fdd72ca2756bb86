import { Context, Effect, Layer, Option, pipe, Redacted, Runtime, Scope } from "effect";
import Fastify from "fastify";
import { Bot, webhookCallback } from "grammy";
import { Commands, CommandsFuncs, InboundMessage } from "../commands";
import { Config, WebhookConfig } from "../config";
import { Notifier, NotifierFuncs } from "../notifier";
import { Scheduler, SchedulerFuncs } from "../scheduler";
import { TelegramBot } from "../telegram";

export class AuthError {
  readonly _tag = "AuthError";
  constructor(readonly underlying: unknown) {}
}

export class ServerError {
  readonly _tag = "ServerError";
  constructor(readonly underlying: unknown) {}
}

export const StartupMessage = "✅ Bot started successfully! Using public API. Scheduled checks are active.";

const onText = (commands: CommandsFuncs, notifier: NotifierFuncs) => (message: InboundMessage) =>
  pipe(
    commands.handle(message),
    Effect.andThen(Option.match({ onNone: () => Effect.void, onSome: notifier.notify })),
    Effect.annotateLogs("chat", message.chatId),
  );

type BootDeps = Readonly<{ bot: Bot; commands: CommandsFuncs; notifier: NotifierFuncs; scheduler: SchedulerFuncs }>;

// handlers run on the caller's runtime so its logger and log level reach every update
const boot = ({ bot, commands, notifier, scheduler }: BootDeps) =>
  pipe(
    Effect.tryPromise({ try: () => bot.init(), catch: error => new AuthError(error) }),
    Effect.tap(() => Effect.logInfo(`authorized on account ${bot.botInfo.username}`)),
    Effect.andThen(() => Effect.runtime<never>()),
    Effect.andThen(runtime =>
      Effect.sync(() => {
        const handle = onText(commands, notifier);
        bot.on("message:text", ctx =>
          Runtime.runPromise(runtime)(
            handle({ chatId: ctx.chat.id, text: ctx.message.text, botUsername: ctx.me.username }),
          ),
        );
        bot.catch(err => Runtime.runFork(runtime)(Effect.logError("failed to handle update", err.error)));
      }),
    ),
    Effect.andThen(() => scheduler.start),
    Effect.andThen(() => notifier.notify(StartupMessage)),
  );

const makeHttp = (bot: Bot, path: string, secret: Option.Option<Redacted.Redacted<string>>) =>
  Fastify()
    .get("/health", async () => ({ ok: true }))
    .post(
      path,
      webhookCallback(bot, "fastify", { secretToken: pipe(secret, Option.map(Redacted.value), Option.getOrUndefined) }),
    );

const polling = (bot: Bot) =>
  Effect.acquireUseRelease(
    Effect.logInfo("receiving updates by long polling"),
    () => Effect.tryPromise({ try: () => bot.start(), catch: error => new ServerError(error) }),
    () => Effect.promise(() => bot.stop()),
  );

const webhook = (bot: Bot, { url, port, secret }: WebhookConfig) =>
  pipe(
    Effect.acquireRelease(
      Effect.tryPromise({
        try: async () => {
          const http = makeHttp(bot, new URL(url).pathname, secret);
          await http.listen({ host: "0.0.0.0", port });
          return http;
        },
        catch: error => new ServerError(error),
      }),
      http => Effect.promise(() => http.close()),
    ),
    Effect.andThen(() =>
      Effect.tryPromise({
        try: () =>
          bot.api.setWebhook(url, { secret_token: pipe(secret, Option.map(Redacted.value), Option.getOrUndefined) }),
        catch: error => new ServerError(error),
      }),
    ),
    Effect.andThen(() => Effect.logInfo(`receiving updates by webhook on port ${port}`)),
    Effect.andThen(() => Effect.never),
  );

export class Server extends Context.Tag("Server")<
  Server,
  Readonly<{ start: Effect.Effect<void, AuthError | ServerError, Scope.Scope> }>
>() {}
export const ServerLive = Layer.effect(
  Server,
  Effect.Do.pipe(
    Effect.bind("c", () => Config),
    Effect.bind("config", ({ c }) => c.getConfig),
    Effect.bind("bot", () => TelegramBot),
    Effect.bind("commands", () => Commands),
    Effect.bind("notifier", () => Notifier),
    Effect.bind("scheduler", () => Scheduler),
    Effect.andThen(({ config, bot, commands, notifier, scheduler }) =>
      Server.of({
        start: pipe(
          boot({ bot, commands, notifier, scheduler }),
          Effect.andThen(() =>
            Option.match(config.webhook, {
              onNone: () => polling(bot),
              onSome: w => webhook(bot, w),
            }),
          ),
        ),
      }),
    ),
  ),
);

export const forTesting = { boot, makeHttp, onText };
