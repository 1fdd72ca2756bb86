import { Option, pipe } from "effect";

export type ParsedCommand = Readonly<{
  command: string;
  /** The bot named after `@`, for commands addressed to one bot in a group. */
  mention: Option.Option<string>;
  args: readonly string[];
}>;

const re = /^\/([a-z0-9_]+)(?:@(\w+))?(?:\s+([\s\S]*))?$/i;

export const parseCommand = (messageText: string): Option.Option<ParsedCommand> =>
  pipe(
    Option.fromNullable(re.exec(messageText.trim())),
    Option.map(res => ({
      command: (res[1] ?? "").toLowerCase(),
      mention: Option.fromNullable(res[2]),
      args: (res[3] ?? "").split(/\s+/).filter(a => a.length > 0),
    })),
  );

const schemeRe = /^[a-z][a-z0-9+.-]*:\/\//;

// "HTTPS://Example.com/path" -> "example.com"
export const normalizeDomain = (raw: string) => {
  const noScheme = raw.trim().toLowerCase().replace(schemeRe, "");
  const cut = noScheme.search(/[/?#]/);
  return (cut === -1 ? noScheme : noScheme.slice(0, cut)).replace(/\.$/, "");
};
