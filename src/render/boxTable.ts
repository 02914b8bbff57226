import type { Charset } from "../types.js";

interface BoxGlyphs {
  horizontal: string;
  vertical: string; // outer border
  divider: string; // between columns
  topLeft: string;
  topJoin: string;
  topRight: string;
  headerLine: string;
  headerLeft: string;
  headerJoin: string;
  headerRight: string;
  bottomLeft: string;
  bottomJoin: string;
  bottomRight: string;
}

const GLYPHS: Record<Charset, BoxGlyphs> = {
  unicode: {
    horizontal: "─",
    vertical: "│",
    divider: "┆",
    topLeft: "┌",
    topJoin: "┬",
    topRight: "┐",
    headerLine: "═",
    headerLeft: "╞",
    headerJoin: "╪",
    headerRight: "╡",
    bottomLeft: "└",
    bottomJoin: "┴",
    bottomRight: "┘"
  },
  ascii: {
    horizontal: "-",
    vertical: "|",
    divider: "|",
    topLeft: "+",
    topJoin: "+",
    topRight: "+",
    headerLine: "=",
    headerLeft: "+",
    headerJoin: "+",
    headerRight: "+",
    bottomLeft: "+",
    bottomJoin: "+",
    bottomRight: "+"
  }
};

function columnWidths(grid: readonly (readonly string[])[]): number[] {
  const columns = Math.max(0, ...grid.map((row) => row.length));
  const widths = new Array<number>(columns).fill(0);
  for (const row of grid) {
    row.forEach((cell, i) => {
      widths[i] = Math.max(widths[i], [...cell].length);
    });
  }
  return widths;
}

function rule(widths: number[], fill: string, left: string, join: string, right: string): string {
  return left + widths.map((w) => fill.repeat(w + 2)).join(join) + right;
}

type CellStyle = (text: string, column: number) => string;

const plain: CellStyle = (text) => text;

// Title cell in italics, the other header cells in bold.
const ansiHeader: CellStyle = (text, column) =>
  column === 0 ? `\x1b[3m${text}\x1b[23m` : `\x1b[1m${text}\x1b[22m`;

function line(row: readonly string[], widths: number[], g: BoxGlyphs, style: CellStyle = plain): string {
  const cells = widths.map((w, i) => {
    const cell = row[i] ?? "";
    const styled = cell === "" ? cell : style(cell, i);
    return ` ${styled}${" ".repeat(w - [...cell].length)} `;
  });
  return g.vertical + cells.join(g.divider) + g.vertical;
}

export interface RenderOptions {
  /** ANSI italic/bold header cells; honoured by the unicode charset only. */
  styleHeader?: boolean;
}

/**
 * Draws a bordered table whose first row is the header. Body rows are not
 * separated from each other. Returns the lines joined by "\n", no trailing newline.
 */
export function renderTable(
  grid: readonly (readonly string[])[],
  charset: Charset = "unicode",
  opts: RenderOptions = {}
): string {
  if (grid.length === 0) return "";
  const g = GLYPHS[charset];
  const widths = columnWidths(grid);
  const [header, ...body] = grid;
  const headerStyle = opts.styleHeader && charset === "unicode" ? ansiHeader : plain;

  const lines = [
    rule(widths, g.horizontal, g.topLeft, g.topJoin, g.topRight),
    line(header, widths, g, headerStyle)
  ];
  if (body.length > 0) {
    lines.push(rule(widths, g.headerLine, g.headerLeft, g.headerJoin, g.headerRight));
    for (const row of body) lines.push(line(row, widths, g));
  }
  lines.push(rule(widths, g.horizontal, g.bottomLeft, g.bottomJoin, g.bottomRight));
  return lines.join("\n");
}
