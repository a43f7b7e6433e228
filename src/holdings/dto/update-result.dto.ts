import { RowOutcome } from '../entities/row-update.entity';

// Summary of one ledger refresh
export interface UpdateResultDto {
  runId: string;
  path: string;
  linesRead: number;
  quotesFetched: number;           // size of the run's price cache
  rowsRewritten: number;
  rowsUnchanged: number;
  outcomes: RowOutcome[];          // one per data row, in document order
}
