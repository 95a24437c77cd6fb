import { isDebugMode, logDebug } from "./debug";
import { renderInline } from "./inline-renderer";
import type { Table } from "./types";

const BODY_CELL_OPEN =
  '<section data-mpa-md-key="text" style="font-size: 15px;color: rgb(51, 51, 51);letter-spacing: 1px;" ' +
  'data-mpa-md-template="30005">';
const BODY_CELL_CLOSE = "</section>";

/** Splits a pipe row on unescaped `|`; one outer pipe on each side is optional. */
export function splitTableRow(line: string): string[] {
  let row = line.trim();
  if (row.startsWith("|")) row = row.slice(1);
  if (row.endsWith("|") && !row.endsWith("\\|")) row = row.slice(0, -1);

  const cells: string[] = [];
  let current = "";
  for (let i = 0; i < row.length; i++) {
    const c = row[i];
    if (c === "\\" && row[i + 1] === "|") {
      current += "|";
      i++;
      continue;
    }
    if (c === "|") {
      cells.push(current.trim());
      current = "";
      continue;
    }
    current += c;
  }
  cells.push(current.trim());
  return cells;
}

export function isTableSeparator(cells: string[]): boolean {
  if (cells.length === 0) return false;
  return cells.every((cell) => /^[:-]+$/.test(cell) && cell.replace(/:/g, "").length >= 3);
}

export function isTableStart(lines: string[], index: number): boolean {
  if (!lines[index]?.includes("|") || index + 1 >= lines.length) return false;
  return isTableSeparator(splitTableRow(lines[index + 1]));
}

export function collectTableRun(lines: string[], start: number): { lines: string[]; next: number } {
  let i = start + 2;
  while (i < lines.length && lines[i].includes("|") && lines[i].trim() !== "") {
    i++;
  }
  return { lines: lines.slice(start, i), next: i };
}

export function parseTable(lines: string[]): Table {
  const split = lines.map(splitTableRow);
  const hasHeader = split.length > 1 && isTableSeparator(split[1]);
  const header = hasHeader ? split[0] : null;
  const rows = hasHeader ? split.slice(2) : split;

  const columnCount = rows.reduce((max, row) => Math.max(max, row.length), header?.length ?? 0);
  const pad = (row: string[]) => {
    if (row.length < columnCount && isDebugMode()) {
      logDebug(`Padding table row from ${row.length} to ${columnCount} cells`);
    }
    return [...row, ...Array<string>(columnCount - row.length).fill("")];
  };

  return {
    header: header ? pad(header) : null,
    rows: rows.map(pad),
    columnCount,
  };
}

export function renderTable(table: Table): string {
  const parts = ["<table>", "  <tbody>"];

  if (table.header) {
    parts.push("    <tr>");
    for (const cell of table.header) {
      parts.push("      <td>");
      parts.push("        <section>");
      parts.push(`          <span leaf="">${renderInline(cell)}</span>`);
      parts.push("        </section>");
      parts.push("      </td>");
    }
    parts.push("    </tr>");
  }

  for (const row of table.rows) {
    parts.push("    <tr>");
    for (const cell of row) {
      parts.push("      <td>");
      parts.push("        <section>");
      parts.push("          " + BODY_CELL_OPEN);
      parts.push(`            <span leaf="">${renderInline(cell)}</span>`);
      parts.push("          " + BODY_CELL_CLOSE);
      parts.push("        </section>");
      parts.push("      </td>");
    }
    parts.push("    </tr>");
  }

  parts.push("  </tbody>");
  parts.push("</table>");
  return parts.join("\n");
}

export function renderTableRun(lines: string[]): string {
  return renderTable(parseTable(lines));
}
