import { z } from "zod";

const schema = z.object({
  input: z.string().min(1),
  scores: z.array(z.number().finite()).optional(),
  display: z.boolean(),
  format: z.enum(["text", "json"]),
  logLevel: z.enum(["debug", "info", "warn", "error"]),
});

export type CliConfig = z.infer<typeof schema>;

const DEFAULTS = {
  display: true,
  format: "text",
  logLevel: "info",
} as const;

export const USAGE =
  "Usage: cuzick-trend --input <file.csv|file.json> [--scores 1,2,3] " +
  "[--display true|false] [--quiet] [--format text|json] [--log-level debug|info|warn|error]";

type CliRaw = Record<string, string | boolean>;

export function buildCliConfig(
  argv: readonly string[],
  env: NodeJS.ProcessEnv = process.env,
): CliConfig {
  const args = parseCliArgs(argv);

  const displayFallback = parseBool(env.CUZICK_DISPLAY) ?? DEFAULTS.display;
  const display = args.quiet === true ? false : readBool(args, "display", displayFallback);

  return schema.parse({
    input: readString(args, "input", ""),
    scores: readNumberList(args, "scores"),
    display,
    format: readString(args, "format", DEFAULTS.format),
    logLevel: readString(args, "log-level", env.LOG_LEVEL ?? DEFAULTS.logLevel),
  });
}

function parseCliArgs(argv: readonly string[]): CliRaw {
  const out: CliRaw = {};
  for (let i = 0; i < argv.length; i += 1) {
    const token = argv[i];
    if (token === undefined || !token.startsWith("--")) {
      continue;
    }
    const key = token.slice(2);
    const next = argv[i + 1];
    if (next === undefined || next.startsWith("--")) {
      out[key] = true;
      continue;
    }
    out[key] = next;
    i += 1;
  }
  return out;
}

function readString(args: CliRaw, key: string, fallback: string): string {
  const value = args[key];
  if (typeof value === "string") {
    return value;
  }
  return fallback;
}

function readNumberList(args: CliRaw, key: string): number[] | undefined {
  const value = args[key];
  if (typeof value !== "string") {
    return undefined;
  }
  return value
    .split(",")
    .map((part) => part.trim())
    .filter((part) => part.length > 0)
    .map(Number);
}

function readBool(args: CliRaw, key: string, fallback: boolean): boolean {
  const value = args[key];
  if (typeof value === "boolean") {
    return value;
  }
  return parseBool(value) ?? fallback;
}

function parseBool(value: string | undefined): boolean | undefined {
  if (value === undefined) {
    return undefined;
  }
  const normalized = value.trim().toLowerCase();
  if (normalized === "true" || normalized === "1" || normalized === "yes") {
    return true;
  }
  if (normalized === "false" || normalized === "0" || normalized === "no") {
    return false;
  }
  return undefined;
}
