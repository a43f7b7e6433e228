export type UnchangedReason =
  | 'not_decodable'
  | 'no_quote'
  | 'zero_quantity'
  | 'non_positive_price'
  | 'missing_market_value_column'
  | 'encode_failed';

// Result of refreshing one data row; "unchanged" rows are emitted verbatim.
export type RowUpdate =
  | { kind: 'rewritten'; line: string; code: string }
  | { kind: 'unchanged'; line: string; reason: UnchangedReason; code?: string };

export interface RowOutcome {
  lineNumber: number;
  kind: RowUpdate['kind'];
  code?: string;
  reason?: UnchangedReason;
}

export interface DocumentUpdate {
  content: string;
  outcomes: RowOutcome[];
  rowsRewritten: number;
  rowsUnchanged: number;
}
