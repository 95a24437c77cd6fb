import { existsSync, readFileSync, statSync } from "node:fs";
import { dirname, join, resolve } from "node:path";
import { fileURLToPath } from "node:url";

import { TemplateDirectoryMissingError, TemplateMissingError } from "./errors";
import { TEMPLATE_FILES, type Template, type TemplateKey, type TemplateSet } from "./types";

const fileNameForThisModule = fileURLToPath(import.meta.url);
const directoryForThisModule = dirname(fileNameForThisModule);

export const DEFAULT_TEMPLATES_DIR = resolve(directoryForThisModule, "..", "templates");

const PLACEHOLDER_RE = /\{([^{}\s]+)\}/g;

export function loadTemplates(dir: string = DEFAULT_TEMPLATES_DIR): TemplateSet {
  assertTemplateDirectory(dir);
  return buildTemplateSet((key) => loadTemplate(dir, key));
}

export function loadTemplate(dir: string, key: TemplateKey): Template {
  const name = TEMPLATE_FILES[key];
  const path = join(dir, name);
  if (!existsSync(path)) {
    throw new TemplateMissingError(name, path);
  }
  return { name, text: readFileSync(path, "utf-8") };
}

export function createTemplateSet(texts: Record<TemplateKey, string>): TemplateSet {
  return buildTemplateSet((key) => ({ name: TEMPLATE_FILES[key], text: texts[key] }));
}

function buildTemplateSet(make: (key: TemplateKey) => Template): TemplateSet {
  return {
    contentBlock: make("contentBlock"),
    blankLine: make("blankLine"),
    divider: make("divider"),
    heading1: make("heading1"),
    heading2: make("heading2"),
    quote: make("quote"),
    text: make("text"),
    image: make("image"),
    bannerTop: make("bannerTop"),
    bannerBottom: make("bannerBottom"),
    terminator: make("terminator"),
  };
}

/**
 * Replaces `{name}` tokens in one pass. Names missing from `substitutions` stay literal,
 * and substituted values are never scanned again.
 */
export function renderTemplate(template: Template, substitutions: Record<string, string> = {}): string {
  return template.text.replace(PLACEHOLDER_RE, (token: string, name: string) =>
    Object.prototype.hasOwnProperty.call(substitutions, name) ? substitutions[name] : token,
  );
}

function assertTemplateDirectory(dir: string) {
  if (!existsSync(dir) || !statSync(dir).isDirectory()) {
    throw new TemplateDirectoryMissingError(dir);
  }
}
