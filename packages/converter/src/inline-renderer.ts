import { isDebugMode, logDebug } from "./debug";

export function escapeHtml(str: string) {
  return str
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;");
}

export function escapeUrl(str: string) {
  return str.replace(/"/g, "%22");
}

/**
 * Renders one span of inline Markdown. Raw `&`, `<` and `>` are escaped before any
 * delimiter is looked at; an opener pairs with the next matching closer and anything
 * left unpaired is emitted as written.
 */
export function renderInline(text: string): string {
  return renderEscapedSpan(escapeHtml(text));
}

function renderEscapedSpan(span: string): string {
  let out = "";
  let i = 0;
  while (i < span.length) {
    const c = span[i];

    if (c === "`") {
      const end = span.indexOf("`", i + 1);
      if (end !== -1) {
        out += `<code>${span.slice(i + 1, end)}</code>`;
        i = end + 1;
        continue;
      }
      out += c;
      i++;
      continue;
    }

    if (c === "*" && span[i + 1] === "*") {
      const end = span.indexOf("**", i + 2);
      if (end > i + 2) {
        out += `<strong>${renderEscapedSpan(span.slice(i + 2, end))}</strong>`;
        i = end + 2;
        continue;
      }
      if (isDebugMode()) {
        logDebug(`Unmatched strong delimiter at ${i}`);
      }
      out += "**";
      i += 2;
      continue;
    }

    if (c === "*" || c === "_") {
      const end = findEmphasisCloser(span, c, i);
      if (end !== -1) {
        out += `<em>${renderEscapedSpan(span.slice(i + 1, end))}</em>`;
        i = end + 1;
        continue;
      }
      out += c;
      i++;
      continue;
    }

    if (c === "[") {
      const link = matchLink(span, i);
      if (link) {
        out += `<a href="${escapeUrl(link.url)}">${renderEscapedSpan(link.text)}</a>`;
        i += link.length;
        continue;
      }
    }

    out += c;
    i++;
  }
  return out;
}

// `_` only opens and closes at word edges so snake_case identifiers stay intact.
function findEmphasisCloser(span: string, char: string, start: number): number {
  if (char === "_" && isWordChar(span[start - 1])) return -1;
  let end = span.indexOf(char, start + 1);
  while (end !== -1) {
    const usable =
      end > start + 1 &&
      !(char === "*" && span[end + 1] === "*") &&
      !(char === "_" && isWordChar(span[end + 1]));
    if (usable) return end;
    if (char === "*" && span[end + 1] === "*") return -1;
    end = span.indexOf(char, end + 1);
  }
  return -1;
}

function isWordChar(c: string | undefined): boolean {
  return c !== undefined && /[A-Za-z0-9]/.test(c);
}

export function matchLink(span: string, start: number): { text: string; url: string; length: number } | null {
  const closeBracket = span.indexOf("]", start + 1);
  if (closeBracket === -1 || span[closeBracket + 1] !== "(") return null;
  const closeParen = span.indexOf(")", closeBracket + 2);
  if (closeParen === -1) return null;
  const url = span.slice(closeBracket + 2, closeParen).trim();
  if (!url || /\s/.test(url)) return null;
  return {
    text: span.slice(start + 1, closeBracket),
    url,
    length: closeParen + 1 - start,
  };
}
