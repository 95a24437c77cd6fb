import { Blob } from "node:buffer";
import { readFile } from "node:fs/promises";
import { basename } from "node:path";
import { Agent, FormData, fetch as undiciFetch, type RequestInit, type Response } from "undici";
import { z } from "zod";

import { DEFAULT_REMOTE_TIMEOUT_MS, type RemoteConfig } from "./config";
import { ConfigError, RemoteSubmissionError } from "./errors";
import { logger as defaultLogger, type Logger } from "./logger";
import { buildPayloadZip, type SubmissionManifest } from "./payload";
import type { ProcessResult } from "./processor";

export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

const submissionResponseSchema = z
  .object({
    folder: z.string().min(1).optional().catch(undefined),
  })
  .passthrough();

export type SubmissionResponse = z.infer<typeof submissionResponseSchema>;

export interface PostSubmissionOptions {
  baseUrl: string;
  token?: string | null;
  manifest: SubmissionManifest;
  zipPath: string;
  verifySsl?: boolean;
  timeoutMs?: number;
  fetch?: FetchLike;
}

export function submissionUrl(baseUrl: string): string {
  return `${baseUrl.replace(/\/+$/, "")}/api/submissions`;
}

export async function postSubmissionZip(options: PostSubmissionOptions): Promise<SubmissionResponse> {
  const fetchImpl = options.fetch ?? undiciFetch;
  const url = submissionUrl(options.baseUrl);

  const form = new FormData();
  form.append("manifest", JSON.stringify(options.manifest));
  const zipBytes = await readFile(options.zipPath);
  form.append("payload_zip", new Blob([zipBytes], { type: "application/zip" }), basename(options.zipPath));

  const headers: Record<string, string> = {};
  if (options.token) {
    headers.Authorization = `Bearer ${options.token}`;
  }

  // TLS verification off needs its own dispatcher; it is closed once the body is read.
  const dispatcher = options.verifySsl === false ? new Agent({ connect: { rejectUnauthorized: false } }) : undefined;

  let status: number;
  let ok: boolean;
  let text: string;
  try {
    const response = await fetchImpl(url, {
      method: "POST",
      headers,
      body: form,
      signal: AbortSignal.timeout(options.timeoutMs ?? DEFAULT_REMOTE_TIMEOUT_MS),
      dispatcher,
    });
    status = response.status;
    ok = response.ok;
    text = await response.text();
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new RemoteSubmissionError(`Submission to ${url} failed: ${reason}`, null);
  } finally {
    await dispatcher?.close();
  }

  if (!ok) {
    throw new RemoteSubmissionError(`Submission to ${url} returned HTTP ${status}`, status, text);
  }

  let body: unknown;
  try {
    body = JSON.parse(text);
  } catch {
    throw new RemoteSubmissionError(`Submission to ${url} returned a non-JSON body`, status, text);
  }
  const parsed = submissionResponseSchema.safeParse(body);
  if (!parsed.success) {
    throw new RemoteSubmissionError(`Submission to ${url} returned an unexpected body`, status, text);
  }
  return parsed.data;
}

export interface SendToRemoteDeps {
  fetch?: FetchLike;
  logger?: Logger;
}

export async function sendToRemote(
  result: ProcessResult,
  manifest: SubmissionManifest,
  remote: RemoteConfig,
  deps: SendToRemoteDeps = {},
): Promise<SubmissionResponse> {
  const log = deps.logger ?? defaultLogger;
  if (!remote.baseUrl) {
    throw new ConfigError("MD2WECHAT_REMOTE_BASE_URL is not set");
  }
  const zipPath = buildPayloadZip(result);
  log.info(`Submitting ${basename(zipPath)} for ${manifest.folder_name} to ${submissionUrl(remote.baseUrl)}`);
  const response = await postSubmissionZip({
    baseUrl: remote.baseUrl,
    token: remote.token,
    manifest,
    zipPath,
    verifySsl: remote.verifySsl,
    timeoutMs: remote.timeoutMs,
    fetch: deps.fetch,
  });
  log.debug("Remote response", response);
  return response;
}

export function storedFolder(response: SubmissionResponse): string | null {
  return response.folder ?? null;
}
