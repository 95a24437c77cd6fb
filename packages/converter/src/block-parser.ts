import type { Block, TemplateSet } from "./types";
import { DocumentAssembler } from "./assembler";
import { isDebugMode, logDebug } from "./debug";
import { escapeHtml, renderInline } from "./inline-renderer";
import { collectListRun, isListLine, renderListRun } from "./list-renderer";
import { collectTableRun, isTableStart, renderTableRun } from "./table-renderer";
import { renderTemplate } from "./template-store";

const H1_RE = /^\s*#\s+(.*)$/;
const H2_RE = /^\s*##\s+(.*)$/;
const THEMATIC_BREAK_RE = /^\s*([*-])\1\1[\s*-]*$/;
const BLOCKQUOTE_RE = /^\s*>\s?(.*)$/;
const IMAGE_RE = /!\[[^\]]*\]\(([^)]+)\)/;
const IMAGE_GLOBAL_RE = /!\[[^\]]*\]\(([^)]+)\)/g;

export interface ParserContext {
  lines: string[];
  pos: number;
  headingCount: number;
  templates: TemplateSet;
  assembler: DocumentAssembler;
}

export function splitLines(markdown: string): string[] {
  const lines = markdown.replace(/\r\n?/g, "\n").split("\n");
  if (lines[lines.length - 1] === "") lines.pop();
  return lines;
}

export function createParserContext(markdown: string, templates: TemplateSet): ParserContext {
  return {
    lines: splitLines(markdown),
    pos: 0,
    headingCount: 0,
    templates,
    assembler: new DocumentAssembler(templates),
  };
}

/** Runs the scan and returns the context; the caller finishes the assembler. */
export function parseDocument(markdown: string, templates: TemplateSet): ParserContext {
  const ctx = createParserContext(markdown, templates);
  while (ctx.pos < ctx.lines.length) {
    const { block, next } = readBlock(ctx.lines, ctx.pos);
    if (isDebugMode()) {
      logDebug(`Lines ${ctx.pos}-${next - 1}: ${block.kind}, inSection=${ctx.assembler.inSection}`);
    }
    emitBlock(ctx, block);
    ctx.pos = next;
  }
  return ctx;
}

export function readBlocks(markdown: string): Block[] {
  const lines = splitLines(markdown);
  const blocks: Block[] = [];
  let pos = 0;
  while (pos < lines.length) {
    const { block, next } = readBlock(lines, pos);
    blocks.push(block);
    pos = next;
  }
  return blocks;
}

export function readBlock(lines: string[], start: number): { block: Block; next: number } {
  const line = lines[start];

  if (line.trim() === "") {
    return { block: { kind: "blank", lines: [line] }, next: start + 1 };
  }

  if (isThematicBreak(line)) {
    return { block: { kind: "hr", lines: [line] }, next: start + 1 };
  }

  const fence = fenceOf(line);
  if (fence) {
    return readFencedCode(lines, start, fence);
  }

  if (IMAGE_RE.test(line)) {
    const trailingText = line.replace(IMAGE_GLOBAL_RE, "").trim();
    return { block: { kind: "image", lines: [line], trailingText }, next: start + 1 };
  }

  const h1 = line.match(H1_RE);
  if (h1) {
    return { block: { kind: "heading1", lines: [line], title: h1[1].trim() }, next: start + 1 };
  }

  const h2 = line.match(H2_RE);
  if (h2) {
    return { block: { kind: "heading2", lines: [line], title: h2[1].trim() }, next: start + 1 };
  }

  if (BLOCKQUOTE_RE.test(line)) {
    let i = start + 1;
    while (i < lines.length && BLOCKQUOTE_RE.test(lines[i])) i++;
    return { block: { kind: "blockquote", lines: lines.slice(start, i) }, next: i };
  }

  if (isListLine(line)) {
    const run = collectListRun(lines, start);
    return { block: { kind: "list", lines: lines.slice(start, run.next), items: run.items }, next: run.next };
  }

  if (isTableStart(lines, start)) {
    const run = collectTableRun(lines, start);
    return { block: { kind: "table", lines: run.lines }, next: run.next };
  }

  let i = start + 1;
  while (i < lines.length && !startsOtherBlock(lines, i)) i++;
  return { block: { kind: "paragraph", lines: lines.slice(start, i) }, next: i };
}

function readFencedCode(lines: string[], start: number, fence: string): { block: Block; next: number } {
  let i = start + 1;
  while (i < lines.length) {
    if (lines[i].trim().startsWith(fence)) {
      return {
        block: { kind: "fenced-code", lines: lines.slice(start + 1, i), fence, closed: true },
        next: i + 1,
      };
    }
    i++;
  }
  if (isDebugMode()) {
    logDebug(`Unterminated ${fence} fence opened at line ${start}; rest of document is code`);
  }
  return {
    block: { kind: "fenced-code", lines: lines.slice(start + 1), fence, closed: false },
    next: lines.length,
  };
}

function startsOtherBlock(lines: string[], index: number): boolean {
  const line = lines[index];
  return (
    line.trim() === "" ||
    isThematicBreak(line) ||
    fenceOf(line) !== null ||
    IMAGE_RE.test(line) ||
    H1_RE.test(line) ||
    H2_RE.test(line) ||
    BLOCKQUOTE_RE.test(line) ||
    isListLine(line) ||
    isTableStart(lines, index)
  );
}

// Three identical `-` or `*` in a row, then any mix of spaces, `-` and `*`.
export function isThematicBreak(line: string): boolean {
  return THEMATIC_BREAK_RE.test(line);
}

export function fenceOf(line: string): string | null {
  const stripped = line.trimStart();
  if (stripped.startsWith("```")) return "```";
  if (stripped.startsWith("~~~")) return "~~~";
  return null;
}

export function formatPartIndex(count: number): string {
  return String(count).padStart(2, "0");
}

/** Code travels as one text fragment: `code:` then the lines joined by a literal `\n`. */
export function encodeCodeText(codeLines: string[]): string {
  const raw = codeLines.join("\n");
  return "code:" + raw.replace(/\\/g, "\\\\").replace(/\n/g, "\\n");
}

export function emitBlock(ctx: ParserContext, block: Block): void {
  const { assembler, templates } = ctx;

  switch (block.kind) {
    case "blank":
      if (assembler.inSection) {
        assembler.append(renderTemplate(templates.blankLine));
        assembler.sealSection();
      }
      return;
    case "hr":
      assembler.emitTopLevel(renderTemplate(templates.divider));
      return;
    case "heading1": {
      assembler.sealSection();
      ctx.headingCount++;
      assembler.append(
        renderTemplate(templates.heading1, {
          index: formatPartIndex(ctx.headingCount),
          title: renderInline(block.title),
        }),
      );
      return;
    }
    case "heading2":
      assembler.sealSection();
      assembler.append(renderTemplate(templates.heading2, { title: renderInline(block.title) }));
      return;
    case "blockquote": {
      const content = block.lines
        .map((line) => renderInline(line.replace(BLOCKQUOTE_RE, "$1")))
        .join("<br>");
      assembler.append(renderTemplate(templates.quote, { content }));
      return;
    }
    case "fenced-code":
      assembler.append(renderTemplate(templates.text, { content: escapeHtml(encodeCodeText(block.lines)) }));
      return;
    case "image":
      assembler.append(renderTemplate(templates.image));
      if (block.trailingText) {
        assembler.append(renderTemplate(templates.text, { content: renderInline(block.trailingText) }));
      }
      return;
    case "list":
      assembler.append(renderListRun(block.items));
      return;
    case "table":
      assembler.append(renderTableRun(block.lines));
      return;
    case "paragraph": {
      const text = block.lines.map((line) => line.trim()).join("\n");
      assembler.append(renderTemplate(templates.text, { content: renderInline(text) }));
      return;
    }
  }
}
