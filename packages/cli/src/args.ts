const BOOLEAN_FLAGS = new Set(["help", "version", "verbose", "quiet", "dry-run"]);

const KNOWN_FLAGS = new Set([
  ...BOOLEAN_FLAGS,
  "config", "provider", "model", "api-key", "api-url",
  "var", "title", "author", "diff", "thread", "file", "max-tokens",
]);

export interface ParsedArgs {
  command: string;
  args: Record<string, string>;
  /** Values collected from repeated `--var name=value` flags. */
  vars: Record<string, string>;
  positional: string[];
}

function parseVar(raw: string): [string, string] {
  const at = raw.indexOf("=");
  if (at <= 0) {
    throw new Error(`--var expects name=value, got "${raw}"`);
  }
  return [raw.slice(0, at), raw.slice(at + 1)];
}

export function parseArgs(argv: string[]): ParsedArgs {
  const command = argv[0] || "";
  const args: Record<string, string> = {};
  const vars: Record<string, string> = {};
  const positional: string[] = [];

  for (let i = 1; i < argv.length; i++) {
    const arg = argv[i];
    if (arg.startsWith("--")) {
      const key = arg.slice(2);

      if (!KNOWN_FLAGS.has(key)) {
        process.stderr.write(`[review-prompts] Warning: unknown flag --${key}\n`);
      }

      if (BOOLEAN_FLAGS.has(key)) {
        args[key] = "true";
        continue;
      }

      if (i + 1 >= argv.length || argv[i + 1].startsWith("--")) {
        throw new Error(`--${key} requires a value`);
      }
      const value = argv[++i];

      if (key === "var") {
        const [name, varValue] = parseVar(value);
        vars[name] = varValue;
      } else {
        args[key] = value;
      }
    } else if (arg.startsWith("-") && arg.length > 1) {
      const key = arg.slice(1);
      if (key === "h") args["help"] = "true";
      else if (key === "v") args["version"] = "true";
      else args[key] = argv[++i] || "";
    } else {
      positional.push(arg);
    }
  }

  // Handle --verbose / --quiet
  if (args["verbose"] === "true") {
    process.env.REVIEW_PROMPTS_LOG_LEVEL = "debug";
  } else if (args["quiet"] === "true") {
    process.env.REVIEW_PROMPTS_LOG_LEVEL = "error";
  }

  return { command, args, vars, positional };
}
