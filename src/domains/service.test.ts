import { Effect, Either } from "effect";
import * as fs from "node:fs/promises";
import * as os from "node:os";
import * as path from "node:path";
import { DomainStoreMemory, forTesting } from "./service";
import { DomainStore, DomainStoreFuncs } from "./types";

const { makeFileStore, parseLines } = forTesting;

const leftOf = <A, E>(e: Either.Either<A, E>) => (Either.isLeft(e) ? e.left : undefined);

describe("file domain store", () => {
  let dir: string;
  let file: string;

  beforeEach(async () => {
    dir = await fs.mkdtemp(path.join(os.tmpdir(), "domains-"));
    file = path.join(dir, "data", "domains.txt");
  });

  afterEach(async () => {
    await fs.rm(dir, { recursive: true, force: true });
  });

  it("creates the directory and an empty file when missing", () =>
    Effect.gen(function* () {
      const store = yield* makeFileStore(file);
      expect(yield* store.list).toEqual([]);

      const content = yield* Effect.promise(() => fs.readFile(file, "utf-8"));
      expect(content).toEqual("");
    }).pipe(Effect.runPromise));

  it("leaves an existing file alone", async () => {
    await fs.mkdir(path.dirname(file), { recursive: true });
    await fs.writeFile(file, "a.com\n\nb.com\r\n", "utf-8");

    const domains = await makeFileStore(file).pipe(
      Effect.andThen(s => s.list),
      Effect.runPromise,
    );
    expect(domains).toEqual(["a.com", "b.com"]);
  });

  it("adds a domain and persists the whole list", () =>
    Effect.gen(function* () {
      const store = yield* makeFileStore(file);
      yield* store.add("a.com");
      yield* store.add("b.com");

      expect(yield* store.list).toEqual(["a.com", "b.com"]);
      const content = yield* Effect.promise(() => fs.readFile(file, "utf-8"));
      expect(content).toEqual("a.com\nb.com");
    }).pipe(Effect.runPromise));

  it("removes a domain and persists the whole list", () =>
    Effect.gen(function* () {
      const store = yield* makeFileStore(file);
      yield* store.add("a.com");
      yield* store.add("b.com");
      yield* store.remove("a.com");

      expect(yield* store.list).toEqual(["b.com"]);
      const content = yield* Effect.promise(() => fs.readFile(file, "utf-8"));
      expect(content).toEqual("b.com");
    }).pipe(Effect.runPromise));

  it("serializes concurrent mutations", () =>
    Effect.gen(function* () {
      const store = yield* makeFileStore(file);
      const domains = Array.from({ length: 20 }, (_, i) => `d${i}.com`);

      yield* Effect.forEach(domains, d => store.add(d), { concurrency: "unbounded", discard: true });

      const listed = yield* store.list;
      expect([...listed].sort()).toEqual([...domains].sort());
    }).pipe(Effect.runPromise));

  it("reports a read failure as a StorageError", () =>
    Effect.gen(function* () {
      const store = yield* makeFileStore(file);
      yield* Effect.promise(() => fs.rm(file));

      const res = yield* store.list.pipe(Effect.either);
      expect(leftOf(res)).toEqual(expect.objectContaining({ _tag: "StorageError", operation: "read" }));
    }).pipe(Effect.runPromise));
});

describe("domain store", () => {
  const run = <A, E>(initial: readonly string[], f: (s: DomainStoreFuncs) => Effect.Effect<A, E>) =>
    Effect.gen(function* () {
      const store = yield* DomainStore;
      const result = yield* f(store).pipe(Effect.either);
      return { result, domains: yield* store.list };
    }).pipe(Effect.provide(DomainStoreMemory(initial)), Effect.runPromise);

  it("adding a new domain grows the list by one", async () => {
    const { result, domains } = await run(["a.com"], s => s.add("b.com"));
    expect(Either.isRight(result)).toBe(true);
    expect(domains).toEqual(["a.com", "b.com"]);
  });

  it("adding a present domain is a duplicate and changes nothing", async () => {
    const { result, domains } = await run(["a.com", "b.com"], s => s.add("a.com"));
    expect(leftOf(result)).toEqual(expect.objectContaining({ _tag: "DuplicateError", domain: "a.com" }));
    expect(domains).toEqual(["a.com", "b.com"]);
  });

  it.each(["", "a.com b.com", "a.com,b.com", "x.com&json=false", "a+b.com", "a%2c.com", "-a.com", "a..com"])(
    "rejects invalid domain '%s'",
    async d => {
      const { result, domains } = await run([], s => s.add(d));
      expect(leftOf(result)).toEqual(expect.objectContaining({ _tag: "ValidationError", domain: d }));
      expect(domains).toEqual([]);
    },
  );

  it.each(["example.com", "sub-1.example.co.id", "xn--80ak6aa92e.com", "пример.рф", "localhost"])(
    "accepts hostname '%s'",
    async d => {
      const { result, domains } = await run([], s => s.add(d));
      expect(Either.isRight(result)).toBe(true);
      expect(domains).toEqual([d]);
    },
  );

  it("removing a present domain shrinks the list by one", async () => {
    const { result, domains } = await run(["a.com", "b.com", "c.com"], s => s.remove("b.com"));
    expect(Either.isRight(result)).toBe(true);
    expect(domains).toEqual(["a.com", "c.com"]);
  });

  it("removing an absent domain is not found and changes nothing", async () => {
    const { result, domains } = await run(["a.com"], s => s.remove("x.com"));
    expect(leftOf(result)).toEqual(expect.objectContaining({ _tag: "NotFoundError", domain: "x.com" }));
    expect(domains).toEqual(["a.com"]);
  });

  it("an empty store lists nothing", async () => {
    const { domains } = await run([], s => s.list);
    expect(domains).toEqual([]);
  });
});

describe("parseLines", () => {
  it("drops blank lines and repeated entries, keeping first-seen order", () => {
    expect(parseLines("b.com\n\n a.com \r\nb.com\n")).toEqual(["b.com", "a.com"]);
  });
});
