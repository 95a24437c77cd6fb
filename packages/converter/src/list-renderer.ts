import { isDebugMode, logDebug } from "./debug";
import { renderInline } from "./inline-renderer";
import type { ListItem, ListMarker, ListNode } from "./types";

const ORDERED_RE = /^(\s*)(\d{1,9})[.)]\s+(.*)$/;
const BULLET_RE = /^(\s*)([-+*])\s+(.*)$/;

const UL_STYLE_TYPES = ["disc", "square", "circle"];
const OL_STYLE_TYPES = ["decimal", "lower-alpha", "lower-roman", "upper-alpha"];

export function measureIndent(whitespace: string): number {
  return whitespace.replace(/\t/g, "    ").length;
}

export function parseListLine(line: string): ListItem | null {
  const ordered = line.match(ORDERED_RE);
  if (ordered) {
    return { marker: "ol", depth: Math.floor(measureIndent(ordered[1]) / 2), text: ordered[3].trim() };
  }
  const bullet = line.match(BULLET_RE);
  if (bullet) {
    return { marker: "ul", depth: Math.floor(measureIndent(bullet[1]) / 2), text: bullet[3].trim() };
  }
  return null;
}

export function isListLine(line: string): boolean {
  return parseListLine(line) !== null;
}

export function collectListRun(lines: string[], start: number): { items: ListItem[]; next: number } {
  const items: ListItem[] = [];
  let i = start;
  while (i < lines.length) {
    const item = parseListLine(lines[i]);
    if (!item) break;
    items.push(item);
    i++;
  }
  return { items, next: i };
}

/**
 * Nests items by depth with an explicit stack of open nodes, `stack[d]` being the open
 * node at depth d. An item more than one level deeper than the previous one is clamped
 * to exactly one level deeper.
 */
export function buildListForest(items: ListItem[]): ListNode[] {
  const roots: ListNode[] = [];
  const stack: ListNode[] = [];

  for (const item of items) {
    const depth = Math.min(item.depth, stack.length);
    if (depth !== item.depth && isDebugMode()) {
      logDebug(`Clamped list item "${item.text}" from depth ${item.depth} to ${depth}`);
    }
    const node: ListNode = { marker: item.marker, depth, text: item.text, children: [] };
    stack.splice(depth);
    if (depth === 0) {
      roots.push(node);
    } else {
      stack[depth - 1].children.push(node);
    }
    stack.push(node);
  }

  return roots;
}

export function listStyleType(marker: ListMarker, level: number): string {
  const types = marker === "ul" ? UL_STYLE_TYPES : OL_STYLE_TYPES;
  return types[(level - 1) % types.length];
}

interface OpenList {
  nodes: ListNode[];
  index: number;
  level: number;
  marker: ListMarker | null;
}

/**
 * Renders sibling nodes; consecutive siblings with the same marker share one list element.
 * Nested lists go inside their parent `<li>`. Open lists are kept on an explicit stack, so
 * nesting depth does not grow the call stack.
 */
export function renderList(nodes: ListNode[], level = 1): string {
  const parts: string[] = [];
  const stack: OpenList[] = [{ nodes, index: 0, level, marker: null }];

  while (stack.length > 0) {
    const top = stack[stack.length - 1];
    if (top.index >= top.nodes.length) {
      if (top.marker) parts.push(`</${top.marker}>`);
      stack.pop();
      // closes the item that owns this nested list
      if (stack.length > 0) parts.push("</li>");
      continue;
    }

    const node = top.nodes[top.index];
    top.index++;
    if (top.marker !== node.marker) {
      if (top.marker) parts.push(`</${top.marker}>`);
      parts.push(openListTag(node.marker, top.level));
      top.marker = node.marker;
    }

    parts.push(`<li>${renderItemContent(node)}`);
    if (node.children.length > 0) {
      stack.push({ nodes: node.children, index: 0, level: top.level + 1, marker: null });
    } else {
      parts.push("</li>");
    }
  }

  return parts.join("");
}

function openListTag(marker: ListMarker, level: number): string {
  const style = `list-style-type: ${listStyleType(marker, level)};padding-left: 1.2em;color: rgb(37, 37, 37);width: fit-content;`;
  return `<${marker} style="${style}" class="list-paddingleft-1">`;
}

function renderItemContent(node: ListNode): string {
  const key = node.marker === "ol" ? "ordered-list" : "bullet-list";
  return (
    '<section style="margin-bottom: 8px;font-size: 15px;color:#333333;letter-spacing: 1px;" ' +
    `data-mpa-md-content="t" data-mpa-md-key="${key}" data-mpa-md-template="30005">` +
    `<span leaf="">${renderInline(node.text)}</span>` +
    "</section>"
  );
}

export function renderListRun(items: ListItem[]): string {
  return renderList(buildListForest(items));
}
