import { Effect, Layer, pipe, Ref } from "effect";
import * as fs from "node:fs/promises";
import * as path from "node:path";
import { Config } from "../config";
import { DomainStore, DomainStoreFuncs, DuplicateError, NotFoundError, StorageError, ValidationError } from "./types";

type Backend = Readonly<{
  read: Effect.Effect<readonly string[], StorageError>;
  write: (domains: readonly string[]) => Effect.Effect<void, StorageError>;
}>;

const parseLines = (content: string): readonly string[] =>
  Array.from(
    new Set(
      content
        .split(/\r?\n/)
        .map(l => l.trim())
        .filter(l => l.length > 0),
    ),
  );

// dot-separated labels of letters, digits and inner hyphens; covers punycode and unicode names
const label = "[\\p{L}\\p{N}](?:[\\p{L}\\p{N}-]{0,61}[\\p{L}\\p{N}])?";
const hostnameRe = new RegExp(`^(?=.{1,253}$)${label}(?:\\.${label})*$`, "u");

export const isValidDomain = (domain: string) => hostnameRe.test(domain);

const validate = (domain: string): Effect.Effect<string, ValidationError> =>
  domain.length === 0
    ? Effect.fail(new ValidationError(domain, "domain must not be empty"))
    : !isValidDomain(domain)
    ? Effect.fail(new ValidationError(domain, "not a valid hostname"))
    : Effect.succeed(domain);

const fileBackend = (file: string): Backend => ({
  read: Effect.tryPromise({
    try: () => fs.readFile(file, "utf-8"),
    catch: error => new StorageError("read", error),
  }).pipe(Effect.map(parseLines)),
  write: domains =>
    Effect.tryPromise({
      try: async () => {
        const tmp = `${file}.${process.pid}.tmp`;
        await fs.writeFile(tmp, domains.join("\n"), "utf-8");
        await fs.rename(tmp, file);
      },
      catch: error => new StorageError("write", error),
    }),
});

const ensureFile = (file: string) =>
  Effect.tryPromise({
    try: async () => {
      await fs.mkdir(path.dirname(file), { recursive: true });
      // "a" creates the file when missing and leaves existing content alone
      const handle = await fs.open(file, "a");
      await handle.close();
    },
    catch: error => new StorageError("init", error),
  });

const makeStore = (backend: Backend) =>
  Effect.map(Effect.makeSemaphore(1), (lock): DomainStoreFuncs => {
    const exclusive = lock.withPermits(1);

    return {
      list: exclusive(backend.read),
      add: domain =>
        pipe(
          validate(domain),
          Effect.andThen(() => backend.read),
          Effect.andThen(domains =>
            domains.includes(domain) ? Effect.fail(new DuplicateError(domain)) : backend.write([...domains, domain]),
          ),
          exclusive,
        ),
      remove: domain =>
        pipe(
          backend.read,
          Effect.andThen(domains =>
            domains.includes(domain)
              ? backend.write(domains.filter(d => d !== domain))
              : Effect.fail(new NotFoundError(domain)),
          ),
          exclusive,
        ),
    };
  });

const makeFileStore = (file: string) =>
  pipe(
    ensureFile(file),
    Effect.tap(() => Effect.logInfo(`using domain list at ${file}`)),
    Effect.andThen(() => makeStore(fileBackend(file))),
  );

const makeMemoryStore = (initial: readonly string[] = []) =>
  pipe(
    Ref.make(parseLines(initial.join("\n"))),
    Effect.andThen(ref =>
      makeStore({
        read: Ref.get(ref),
        write: domains => Ref.set(ref, domains),
      }),
    ),
  );

export const DomainStoreLive = Layer.effect(
  DomainStore,
  pipe(
    Config,
    Effect.andThen(c => c.getConfig),
    Effect.andThen(({ domainsFile }) => makeFileStore(domainsFile)),
    Effect.map(DomainStore.of),
  ),
);

export const DomainStoreMemory = (initial: readonly string[] = []) =>
  Layer.effect(DomainStore, makeMemoryStore(initial).pipe(Effect.map(DomainStore.of)));

export const forTesting = { makeFileStore, parseLines };
