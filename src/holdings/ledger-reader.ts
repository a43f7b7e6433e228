import { decodeRow } from './codec/row-codec';
import { AShareAssetType, HoldingRecord, LedgerHoldings } from './entities/holding-record.entity';
import { Section } from './entities/section.enum';
import { splitDocumentLines } from './ledger-format';
import { scanLines } from './scanner/table-scanner';

/** Every decodable data row of the document, in document order. */
export function readHoldings(content: string): HoldingRecord[] {
  const records: HoldingRecord[] = [];
  for (const line of scanLines(splitDocumentLines(content))) {
    if (line.kind !== 'row' || !line.header) {
      continue;
    }
    const decoded = decodeRow(line.header, line.text, line.section);
    if (decoded.ok) {
      records.push(decoded.record);
    }
  }
  return records;
}

export function groupHoldings(records: readonly HoldingRecord[]): LedgerHoldings {
  const grouped: LedgerHoldings = { etf: [], stock: [], hk: [], fund: [], us: [] };
  for (const record of records) {
    switch (record.section) {
      case Section.A_SHARE:
        (record.assetType === AShareAssetType.ETF ? grouped.etf : grouped.stock).push(record);
        break;
      case Section.HK:
        grouped.hk.push(record);
        break;
      case Section.FUND:
        grouped.fund.push(record);
        break;
      case Section.US:
        grouped.us.push(record);
        break;
      case Section.OTHER:
        break;
    }
  }
  return grouped;
}
