import { Section } from './entities/section.enum';

export const SECTION_HEADING_PREFIX = '## ';
export const TABLE_DELIMITER = '|';
export const PLACEHOLDER = '-';

// First matching substring wins.
export const SECTION_MARKERS: ReadonlyArray<readonly [string, Section]> = [
  ['A股', Section.A_SHARE],
  ['港股', Section.HK],
  ['基金', Section.FUND],
  ['美股', Section.US],
];

export const HEADER_TOKENS = {
  code: '代码',
  name: '名称',
  costBasis: '成本价',
  quantity: ['数量', '份额'],
  marketValue: '市值',
  buyDate: '买入日期',
  fundType: '类型',
} as const;

// Header annotation for cells stored scaled down by 10,000, e.g. "市值(万USD)".
export const TEN_THOUSAND_MARKER = '万';

export const DEFAULT_BUY_DATE = '2023-01-01';

const SEPARATOR_PATTERN = /-{3,}/;

export type HeaderSchema = readonly string[];

export function sectionFromHeading(heading: string): Section {
  const marker = SECTION_MARKERS.find(([token]) => heading.includes(token));
  return marker ? marker[1] : Section.OTHER;
}

export function isSeparatorLine(stripped: string): boolean {
  return SEPARATOR_PATTERN.test(stripped);
}

/**
 * Splits a table line into trimmed cells, dropping the fragments
 * outside the outer delimiters: "| a | b |" -> ["a", "b"].
 */
export function splitCells(line: string): string[] {
  return line
    .trim()
    .split(TABLE_DELIMITER)
    .slice(1, -1)
    .map((cell) => cell.trim());
}

export function joinCells(cells: readonly string[], eol: string): string {
  return `${TABLE_DELIMITER} ${cells.join(` ${TABLE_DELIMITER} `)} ${TABLE_DELIMITER}${eol}`;
}

/** Line terminator carried by a raw line; rewritten rows always end in one. */
export function lineEnding(line: string): string {
  return line.endsWith('\r\n') ? '\r\n' : '\n';
}

/** Splits a document into lines, each keeping its own terminator. */
export function splitDocumentLines(content: string): string[] {
  return content.match(/[^\n]*\n|[^\n]+$/g) ?? [];
}
