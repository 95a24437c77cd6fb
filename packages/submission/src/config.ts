import { tmpdir } from "node:os";
import { z } from "zod";

import { ConfigError } from "./errors";

export const DEFAULT_REMOTE_TIMEOUT_MS = 60_000;

export interface RemoteConfig {
  baseUrl: string | null;
  token: string | null;
  verifySsl: boolean;
  timeoutMs: number;
}

export interface SubmissionConfig {
  remote: RemoteConfig;
  templatesDir: string | null;
  workDir: string;
}

export const parseBool = (value: string | undefined | null, defaultValue: boolean) => {
  if (value == null) return defaultValue;
  const normalized = value.trim().toLowerCase();
  if (["true", "1", "yes", "y"].includes(normalized)) return true;
  if (["false", "0", "no", "n"].includes(normalized)) return false;
  return defaultValue;
};

const blankToUndefined = (value: unknown) =>
  typeof value === "string" && value.trim() === "" ? undefined : value;

const optionalText = z.preprocess(blankToUndefined, z.string().trim().optional());

const envSchema = z.object({
  MD2WECHAT_REMOTE_BASE_URL: z.preprocess(blankToUndefined, z.string().trim().url().optional()),
  MD2WECHAT_REMOTE_TOKEN: optionalText,
  MD2WECHAT_REMOTE_VERIFY_SSL: optionalText,
  MD2WECHAT_REMOTE_TIMEOUT_MS: z.preprocess(blankToUndefined, z.coerce.number().int().positive().optional()),
  MD2WECHAT_TEMPLATES_DIR: optionalText,
  MD2WECHAT_WORK_DIR: optionalText,
});

export function loadSubmissionConfig(env: NodeJS.ProcessEnv = process.env): SubmissionConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; ");
    throw new ConfigError(`Invalid configuration: ${details}`);
  }
  const values = parsed.data;
  return {
    remote: {
      baseUrl: values.MD2WECHAT_REMOTE_BASE_URL ?? null,
      token: values.MD2WECHAT_REMOTE_TOKEN ?? null,
      verifySsl: parseBool(values.MD2WECHAT_REMOTE_VERIFY_SSL, true),
      timeoutMs: values.MD2WECHAT_REMOTE_TIMEOUT_MS ?? DEFAULT_REMOTE_TIMEOUT_MS,
    },
    templatesDir: values.MD2WECHAT_TEMPLATES_DIR ?? null,
    workDir: values.MD2WECHAT_WORK_DIR ?? tmpdir(),
  };
}
