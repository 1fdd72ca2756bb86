import { Config as C, ConfigError, Context, Duration, Effect, Either, Layer, LogLevel, pipe } from "effect";
import { AppConfig } from "./types";

const intInRange = (name: string, min: number, max: number, what: string) =>
  pipe(
    C.number(name),
    C.mapOrFail(n =>
      Number.isInteger(n) && n >= min && n <= max
        ? Either.right(n)
        : Either.left(ConfigError.InvalidData([], `Expected ${n} to be an int in the valid ${what} range`)),
    ),
  );

const httpUrl = (name: string) =>
  pipe(
    C.string(name),
    C.mapOrFail(s => {
      try {
        const u = new URL(s);
        return u.protocol === "http:" || u.protocol === "https:"
          ? Either.right(u.toString())
          : Either.left(ConfigError.InvalidData([], `Expected ${s} to be an http(s) url`));
      } catch {
        return Either.left(ConfigError.InvalidData([], `Expected ${s} to be a valid url`));
      }
    }),
  );

const portConf = intInRange("PORT", 1, 65_535, "port").pipe(C.withDefault(8080));

const webhookConf = C.option(
  C.all({
    url: httpUrl("WEBHOOK_URL"),
    port: portConf,
    secret: C.option(C.redacted("WEBHOOK_SECRET")),
  }),
);

// read before the layers are built so their fibers log at this level too
export const logLevelConfig = C.logLevel("LOG_LEVEL").pipe(C.withDefault(LogLevel.Info));

const createConfig = (): C.Config<AppConfig> =>
  C.all({
    botToken: C.redacted("TELEGRAM_BOT_TOKEN"),
    adminChatId: C.integer("ADMIN_CHAT_ID"),
    domainsFile: C.string("DOMAINS_FILE").pipe(C.withDefault("/data/domains.txt")),
    apiUrl: httpUrl("CHECK_API_URL").pipe(C.withDefault("https://check.skiddle.id/")),
    batchSize: intInRange("CHECK_BATCH_SIZE", 1, 100, "batch size").pipe(C.withDefault(30)),
    requestTimeout: C.duration("CHECK_REQUEST_TIMEOUT").pipe(C.withDefault(Duration.seconds(15))),
    checkInterval: C.duration("CHECK_INTERVAL").pipe(C.withDefault(Duration.minutes(30))),
    webhook: webhookConf,
  });

export class Config extends Context.Tag("Config")<Config, Readonly<{ getConfig: Effect.Effect<AppConfig> }>>() {}
export const ConfigLive = Layer.effect(
  Config,
  createConfig().pipe(Effect.map(c => Config.of({ getConfig: Effect.succeed(c) }))),
);

export const forTesting = { createConfig };
