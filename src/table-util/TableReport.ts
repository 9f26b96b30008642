import pico from "picocolors";
import type { Alignment, SpanningCellConfig, TableUserConfig } from "table";
import { table } from "table";

const isTest = process.env.NODE_ENV === "test" || process.env.VITEST === "true";
const { bold } = isTest ? { bold: (str: string) => str } : pico;

/** Related table columns */
export interface ColumnGroup<T> {
  groupTitle?: string;
  columns: AnyColumn<T>[];
}

export type AnyColumn<T> = Column<T> | DiffColumn<T>;

/** Column with optional formatter */
export interface Column<T> extends ColumnFormat {
  key: keyof T;
  formatter?: (value: unknown) => string;
  diffKey?: undefined;
}

/** Comparison column against the baseline row, blank on the baseline itself */
export interface DiffColumn<T> extends ColumnFormat {
  diffKey: keyof T;
  diffFormatter: (value: unknown, baseline: unknown) => string;
  key?: undefined;
}

interface ColumnFormat {
  title: string;
  alignment?: Alignment;
}

/** Data rows with optional baseline */
export interface ResultGroup<T> {
  results: T[];
  baseline?: T;
}

/** Build formatted table, baseline row last and marked with an arrow */
export function buildTable<T extends object>(
  columnGroups: ColumnGroup<T>[],
  group: ResultGroup<T>,
  nameKey: keyof T,
): string {
  const { results, baseline } = group;
  const columns = columnGroups.flatMap(g => g.columns);
  const dataRows = results.map(r => toRow(r, columns, baseline));
  if (baseline) {
    const row = toRow(baseline, columns, undefined);
    const nameIndex = columns.findIndex(c => c.key === nameKey);
    if (nameIndex >= 0) row[nameIndex] = `--> ${row[nameIndex]}`;
    dataRows.push(row);
  }

  const titles = columns.map(c => bold(c.title));
  const groupRows = groupHeaders(columnGroups, columns.length);
  const config: TableUserConfig = {
    spanningCells: groupSpans(columnGroups, groupRows.length > 0),
    columns: alignments(columns),
    ...createLines(columnGroups, groupRows.length + 1),
  };
  return table([...groupRows, titles, ...dataRows], config);
}

/** @return cell strings for one record */
function toRow<T extends object>(
  record: T,
  columns: AnyColumn<T>[],
  baseline: T | undefined,
): string[] {
  return columns.map(col => {
    if (col.diffKey !== undefined) {
      if (!baseline) return " ";
      return col.diffFormatter(record[col.diffKey], baseline[col.diffKey]);
    }
    const value = record[col.key];
    const text = col.formatter ? col.formatter(value) : String(value ?? "");
    return text || " ";
  });
}

/** @return group title row (empty when no group has a title) */
function groupHeaders<T>(groups: ColumnGroup<T>[], width: number): string[][] {
  if (!groups.some(g => g.groupTitle)) return [];
  const row = groups.flatMap(g => {
    const title = g.groupTitle ? bold(g.groupTitle) : " ";
    return [title, ...Array<string>(g.columns.length - 1).fill(" ")];
  });
  return row.length === width ? [row] : [];
}

/** @return spans so group titles center over their columns */
function groupSpans<T>(
  groups: ColumnGroup<T>[],
  hasGroupRow: boolean,
): SpanningCellConfig[] {
  if (!hasGroupRow) return [];
  let col = 0;
  const alignment: Alignment = "center";
  return groups.map(g => {
    const colSpan = g.columns.length;
    const span = { row: 0, col, colSpan, alignment };
    col += colSpan;
    return span;
  });
}

function alignments<T>(
  columns: AnyColumn<T>[],
): Record<number, { alignment: Alignment }> {
  return Object.fromEntries(
    columns.map((c, i) => [i, { alignment: c.alignment ?? "right" }]),
  );
}

interface Lines {
  drawHorizontalLine: (index: number, size: number) => boolean;
  drawVerticalLine: (index: number, size: number) => boolean;
}

/** @return borders around the table, between groups, and under the header */
function createLines<T>(groups: ColumnGroup<T>[], headerBottom: number): Lines {
  const sectionBorders: number[] = [];
  let border = 0;
  for (const g of groups) {
    border += g.columns.length;
    sectionBorders.push(border);
  }

  function drawVerticalLine(index: number, size: number): boolean {
    return index === 0 || index === size || sectionBorders.includes(index);
  }
  function drawHorizontalLine(index: number, size: number): boolean {
    return index === 0 || index === size || index === headerBottom;
  }
  return { drawHorizontalLine, drawVerticalLine };
}
