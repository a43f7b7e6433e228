import { Section } from '../entities/section.enum';
import {
  HEADER_TOKENS,
  HeaderSchema,
  SECTION_HEADING_PREFIX,
  TABLE_DELIMITER,
  isSeparatorLine,
  sectionFromHeading,
  splitCells,
} from '../ledger-format';

export type LineKind = 'section' | 'header' | 'separator' | 'row' | 'text';

export interface ScannedLine {
  kind: LineKind;
  text: string;                // raw line, terminator included
  lineNumber: number;          // 1-based
  section: Section;
  header: HeaderSchema | null; // schema in effect after this line
}

// Single-pass line classifier.
// The section survives until the next "## " heading; the header schema
// only until the next line that does not start with "|". Nothing else
// resets the header, so two tables with no line between them share the
// first table's schema.
export class TableScanner {
  private currentSection: Section = Section.OTHER;
  private currentHeader: HeaderSchema | null = null;
  private lineCount = 0;

  get section(): Section {
    return this.currentSection;
  }

  get header(): HeaderSchema | null {
    return this.currentHeader;
  }

  next(text: string): ScannedLine {
    this.lineCount += 1;
    const stripped = text.trim();

    if (!stripped.startsWith(TABLE_DELIMITER)) {
      this.currentHeader = null;
      if (stripped.startsWith(SECTION_HEADING_PREFIX)) {
        this.currentSection = sectionFromHeading(stripped);
        return this.emit('section', text);
      }
      return this.emit('text', text);
    }

    if (isSeparatorLine(stripped)) {
      return this.emit('separator', text);
    }

    if (stripped.includes(HEADER_TOKENS.code)) {
      this.currentHeader = splitCells(stripped);
      return this.emit('header', text);
    }

    // a table line with no header above it is inert
    return this.emit(this.currentHeader ? 'row' : 'text', text);
  }

  private emit(kind: LineKind, text: string): ScannedLine {
    return {
      kind,
      text,
      lineNumber: this.lineCount,
      section: this.currentSection,
      header: this.currentHeader,
    };
  }
}

export function scanLines(lines: readonly string[]): ScannedLine[] {
  const scanner = new TableScanner();
  return lines.map((line) => scanner.next(line));
}
