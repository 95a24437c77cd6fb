import { existsSync, readFileSync, writeFileSync } from "node:fs";
import { dirname, join, parse as parsePath } from "node:path";
import { renderWechatHtml, renderWechatHtmlWithDebug } from "md2wechat-converter";
import {
  buildManifest,
  buildPayloadZip,
  createLogger,
  loadSubmissionConfig,
  processUpload,
  resolveLogLevel,
  sendToRemote,
  storedFolder,
  UploadError,
  type FetchLike,
  type Logger,
} from "md2wechat-submission";

import { parseCliArgs, USAGE, UsageError, type CliCommand } from "./args";

export { parseCliArgs, USAGE, UsageError, type CliCommand } from "./args";

export interface CliIo {
  stdout: (line: string) => void;
  stderr: (line: string) => void;
}

export interface CliDeps {
  env?: NodeJS.ProcessEnv;
  fetch?: FetchLike;
  logger?: Logger;
}

export const consoleIo: CliIo = {
  stdout: (line) => console.log(line),
  stderr: (line) => console.error(line),
};

type ConvertCommand = Extract<CliCommand, { command: "convert" }>;
type SubmitCommand = Extract<CliCommand, { command: "submit" }>;

/** Runs one CLI invocation and resolves to its exit code: 0 ok, 1 failure, 2 usage. */
export async function runCli(args: string[], io: CliIo = consoleIo, deps: CliDeps = {}): Promise<number> {
  const env = deps.env ?? process.env;
  let command: CliCommand;
  try {
    command = parseCliArgs(args);
  } catch (error) {
    if (error instanceof UsageError) {
      io.stderr(`Error: ${error.message}`);
      io.stderr(USAGE);
      return 2;
    }
    throw error;
  }

  try {
    if (command.command === "help") {
      io.stdout(USAGE);
      return 0;
    }
    if (command.command === "convert") {
      return runConvert(command, io, env);
    }
    return await runSubmit(command, io, env, deps);
  } catch (error) {
    io.stderr(`Error: ${error instanceof Error ? error.message : String(error)}`);
    return 1;
  }
}

export function defaultOutputPath(input: string): string {
  return join(dirname(input), `${parsePath(input).name}.html`);
}

function runConvert(command: ConvertCommand, io: CliIo, env: NodeJS.ProcessEnv): number {
  if (!existsSync(command.input)) {
    throw new UploadError(`Input file not found: ${command.input}`, command.input);
  }
  const markdown = readFileSync(command.input, "utf-8");
  const templatesDir = command.templatesDir ?? (env.MD2WECHAT_TEMPLATES_DIR || undefined);

  let html: string;
  if (command.debug) {
    const traced = renderWechatHtmlWithDebug(markdown, { templatesDir });
    for (const snapshot of traced.snapshots) {
      io.stderr(`[debug] ${snapshot.stage}: ${snapshot.fragments.length} fragment(s)`);
      for (const entry of snapshot.logs) {
        io.stderr(`[debug]   ${entry}`);
      }
    }
    html = traced.html;
  } else {
    html = renderWechatHtml(markdown, { templatesDir });
  }

  const output = command.output ?? defaultOutputPath(command.input);
  writeFileSync(output, html, "utf-8");
  io.stdout(output);
  return 0;
}

async function runSubmit(command: SubmitCommand, io: CliIo, env: NodeJS.ProcessEnv, deps: CliDeps): Promise<number> {
  const config = loadSubmissionConfig(env);
  const logger = deps.logger ?? createLogger(resolveLogLevel(env));
  const userMeta = { email: command.email, wechat: command.wechat };

  const result = await processUpload(command.input, userMeta, {
    workRoot: config.workDir,
    templatesDir: command.templatesDir ?? config.templatesDir ?? undefined,
    logger,
  });
  io.stdout(`Converted ${result.htmlFiles.length} file(s) into ${result.outDir}`);

  if (command.dryRun) {
    io.stdout(`Payload written to ${buildPayloadZip(result)}`);
    return 0;
  }

  const manifest = buildManifest(result, userMeta);
  const response = await sendToRemote(result, manifest, config.remote, { fetch: deps.fetch, logger });
  const folder = storedFolder(response);
  io.stdout(folder ? `Stored remotely as ${folder}` : "Submitted, not stored");
  return 0;
}
