import { parseDocument } from "./block-parser";
import { captureSnapshot, getDebugSnapshots, resetDebugState, setDebugMode } from "./debug";
import { loadTemplates } from "./template-store";
import type { TemplateSet } from "./types";

export interface ConvertOptions {
  /** Directory holding the template files; ignored when `templates` is given. */
  templatesDir?: string;
  templates?: TemplateSet;
  debug?: boolean;
}

export function renderWechatHtml(markdown: string, options: ConvertOptions = {}): string {
  resetDebugState();
  setDebugMode(!!options.debug);

  const templates = options.templates ?? loadTemplates(options.templatesDir);
  const ctx = parseDocument(markdown, templates);
  captureSnapshot("afterBlockPhase", ctx.assembler.fragments());

  const html = ctx.assembler.finish();
  captureSnapshot("assembled", ctx.assembler.fragments());
  setDebugMode(false);

  return html;
}

export function convertMarkdown(markdown: string): string {
  return renderWechatHtml(markdown);
}

export function renderWechatHtmlWithDebug(
  markdown: string,
  options: Omit<ConvertOptions, "debug"> = {},
): {
  html: string;
  snapshots: ReturnType<typeof getDebugSnapshots>;
} {
  const html = renderWechatHtml(markdown, { ...options, debug: true });
  const snapshots = getDebugSnapshots();
  return { html, snapshots };
}
