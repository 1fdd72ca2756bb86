import { Array as Arr, Effect, Layer, Match, Option, pipe } from "effect";
import { Checker, CheckerFuncs, formatReport } from "../checker";
import { Config } from "../config";
import { DomainStore, DomainStoreFuncs, isValidDomain, StorageError } from "../domains";
import { Monitor, MonitorFuncs } from "../monitor";
import { Notifier, NotifierFuncs } from "../notifier";
import { normalizeDomain, ParsedCommand, parseCommand } from "../parser";
import { Commands, CommandsFuncs } from "./types";

export const HelpText = [
  "Hello! I'm your domain checker bot.",
  "Commands:",
  "/add <domain> - watch one or more domains",
  "/remove <domain> - stop watching one or more domains",
  "/list - show watched domains",
  "/checknow - check every watched domain now",
  "/check <domain> - check domains once without watching them",
].join("\n");

export const UnknownCommand = "I don't know that command.";

type Deps = Readonly<{
  adminChatId: number;
  store: DomainStoreFuncs;
  monitor: MonitorFuncs;
  checker: CheckerFuncs;
  notifier: NotifierFuncs;
}>;

const storageFailure = (what: "reading" | "updating") => (e: StorageError) =>
  Effect.logError(`failed ${what} domain list`, e.underlying).pipe(
    Effect.as(`🚨 Error ${what} domain list: ${e.reason}`),
  );

const eachDomain = (args: readonly string[], f: (domain: string, raw: string) => Effect.Effect<string>) =>
  Effect.forEach(args, arg => f(normalizeDomain(arg), arg)).pipe(Effect.map(lines => lines.join("\n")));

const add = (store: DomainStoreFuncs, args: readonly string[]) =>
  args.length === 0
    ? Effect.succeed("Usage: /add example.com")
    : eachDomain(args, (domain, raw) =>
        pipe(
          store.add(domain),
          Effect.as(`✅ Added '${domain}'`),
          Effect.catchTags({
            ValidationError: () => Effect.succeed(`Invalid domain '${raw}'.`),
            DuplicateError: e => Effect.succeed(`Domain '${e.domain}' is already in the list.`),
            StorageError: storageFailure("updating"),
          }),
        ),
      );

const remove = (store: DomainStoreFuncs, args: readonly string[]) =>
  args.length === 0
    ? Effect.succeed("Usage: /remove example.com")
    : eachDomain(args, (domain, raw) =>
        !isValidDomain(domain)
          ? Effect.succeed(`Invalid domain '${raw}'.`)
          : pipe(
              store.remove(domain),
              Effect.as(`🗑️ Removed '${domain}'`),
              Effect.catchTags({
                NotFoundError: e => Effect.succeed(`Domain '${e.domain}' not found.`),
                StorageError: storageFailure("updating"),
              }),
            ),
      );

const list = (store: DomainStoreFuncs) =>
  pipe(
    store.list,
    Effect.map(domains =>
      domains.length === 0 ? "The domain list is empty." : ["Domains being checked:", ...domains].join("\n"),
    ),
    Effect.catchTag("StorageError", storageFailure("reading")),
  );

const checkNow = (monitor: MonitorFuncs) =>
  pipe(
    monitor.submit("manual"),
    Effect.map(accepted => (accepted ? "🚀 Starting manual check via API..." : "⏳ A check is already queued.")),
  );

// runs outside the update loop; the report arrives as its own message
const checkOnce = ({ checker, notifier }: Deps, args: readonly string[]) =>
  pipe(
    Arr.dedupe(args.map(normalizeDomain).filter(isValidDomain)),
    domains =>
      domains.length === 0
        ? Effect.succeed("Usage: /check example.com")
        : pipe(
            checker.check(domains),
            Effect.map(formatReport),
            Effect.andThen(notifier.notify),
            Effect.forkDaemon,
            Effect.as(`🔍 Checking ${domains.length} domain${domains.length === 1 ? "" : "s"}...`),
          ),
  );

const dispatch = (deps: Deps, { command, args }: ParsedCommand) =>
  Match.value(command).pipe(
    Match.when("start", () => Effect.succeed(HelpText)),
    Match.when("help", () => Effect.succeed(HelpText)),
    Match.when("add", () => add(deps.store, args)),
    Match.when("remove", () => remove(deps.store, args)),
    Match.when("list", () => list(deps.store)),
    Match.when("checknow", () => checkNow(deps.monitor)),
    Match.when("check", () => checkOnce(deps, args)),
    Match.orElse(() => Effect.succeed(UnknownCommand)),
  );

const ignore = (why: string) => Effect.logDebug(why).pipe(Effect.as(Option.none<string>()));

const addressedElsewhere = (mention: Option.Option<string>, botUsername: string | undefined) =>
  botUsername !== undefined && Option.exists(mention, m => m.toLowerCase() !== botUsername.toLowerCase());

const makeCommands = (deps: Deps): CommandsFuncs => ({
  handle: ({ chatId, text, botUsername }) =>
    chatId !== deps.adminChatId
      ? ignore(`ignoring message from chat ${chatId}`)
      : pipe(
          parseCommand(text),
          Option.match({
            onNone: () => Effect.succeed(Option.some(UnknownCommand)),
            onSome: parsed =>
              addressedElsewhere(parsed.mention, botUsername)
                ? ignore(`ignoring '${text}', addressed to another bot`)
                : pipe(
                    dispatch(deps, parsed),
                    Effect.tap(() => Effect.logDebug(`handled '${text}'`)),
                    Effect.map(Option.some),
                  ),
          }),
        ),
});

export const CommandsLive = Layer.effect(
  Commands,
  Effect.Do.pipe(
    Effect.bind("c", () => Config),
    Effect.bind("config", ({ c }) => c.getConfig),
    Effect.bind("store", () => DomainStore),
    Effect.bind("monitor", () => Monitor),
    Effect.bind("checker", () => Checker),
    Effect.bind("notifier", () => Notifier),
    Effect.map(({ config, store, monitor, checker, notifier }) =>
      Commands.of(makeCommands({ adminChatId: config.adminChatId, store, monitor, checker, notifier })),
    ),
  ),
);

export const forTesting = { makeCommands };
