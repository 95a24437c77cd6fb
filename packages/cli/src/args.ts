export type CliCommand =
  | {
      command: "convert";
      input: string;
      output: string | null;
      templatesDir: string | null;
      debug: boolean;
    }
  | {
      command: "submit";
      input: string;
      email: string;
      wechat: string;
      templatesDir: string | null;
      dryRun: boolean;
    }
  | { command: "help" };

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "UsageError";
  }
}

export const USAGE = [
  "Usage:",
  "  md2wechat [convert] <input.md> [-o|--output <file.html>] [-t|--templates <dir>] [--debug]",
  "  md2wechat submit <file.md|file.zip> --email <address> --wechat <id> [-t|--templates <dir>] [--dry-run]",
].join("\n");

interface RawFlags {
  command: "convert" | "submit";
  positionals: string[];
  output?: string;
  templatesDir?: string;
  email?: string;
  wechat?: string;
  debug: boolean;
  dryRun: boolean;
}

export function parseCliArgs(args: string[]): CliCommand {
  const flags: RawFlags = { command: "convert", positionals: [], debug: false, dryRun: false };

  let i = 0;

  // First positional arg may name the command
  const first = args[0];
  if (first === "convert" || first === "submit") {
    flags.command = first;
    i = 1;
  }

  const valueOf = (flag: string) => {
    const value = args[++i];
    if (value === undefined || value.startsWith("-")) {
      throw new UsageError(`${flag} requires a value`);
    }
    return value;
  };

  while (i < args.length) {
    const arg = args[i];
    switch (arg) {
      case "-h":
      case "--help":
        return { command: "help" };
      case "-o":
      case "--output":
        flags.output = valueOf(arg);
        break;
      case "-t":
      case "--templates":
        flags.templatesDir = valueOf(arg);
        break;
      case "--email":
        flags.email = valueOf(arg);
        break;
      case "--wechat":
        flags.wechat = valueOf(arg);
        break;
      case "--debug":
        flags.debug = true;
        break;
      case "--dry-run":
        flags.dryRun = true;
        break;
      default:
        if (arg.startsWith("-") && arg !== "-") {
          throw new UsageError(`Unknown flag: ${arg}`);
        }
        flags.positionals.push(arg);
    }
    i++;
  }

  return toCommand(flags);
}

function toCommand(flags: RawFlags): CliCommand {
  const [input, ...extra] = flags.positionals;
  if (input === undefined) {
    throw new UsageError("Missing input file");
  }
  if (extra.length > 0) {
    throw new UsageError(`Unexpected argument: ${extra[0]}`);
  }

  if (flags.command === "convert") {
    if (flags.email !== undefined || flags.wechat !== undefined || flags.dryRun) {
      throw new UsageError("--email, --wechat and --dry-run only apply to submit");
    }
    return {
      command: "convert",
      input,
      output: flags.output ?? null,
      templatesDir: flags.templatesDir ?? null,
      debug: flags.debug,
    };
  }

  if (flags.output !== undefined || flags.debug) {
    throw new UsageError("--output and --debug only apply to convert");
  }
  const email = requireContact("--email", flags.email);
  const wechat = requireContact("--wechat", flags.wechat);
  return {
    command: "submit",
    input,
    email,
    wechat,
    templatesDir: flags.templatesDir ?? null,
    dryRun: flags.dryRun,
  };
}

function requireContact(flag: string, value: string | undefined): string {
  if (value === undefined) {
    throw new UsageError(`${flag} is required`);
  }
  const trimmed = value.trim();
  if (trimmed === "") {
    throw new UsageError(`${flag} must not be blank`);
  }
  return trimmed;
}
