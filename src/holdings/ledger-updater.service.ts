import { Injectable, Logger } from '@nestjs/common';
import { v4 as uuidv4 } from 'uuid';
import { toDecimal } from '../common/utils/decimal.util';
import { isValidPrice } from '../market-price/entities/price-quote.entity';
import { MarketPriceService } from '../market-price/market-price.service';
import { PriceCache } from '../market-price/price-cache';
import { decodeRow, encodeCell } from './codec/row-codec';
import { UpdateResultDto } from './dto/update-result.dto';
import { DocumentUpdate, RowOutcome, RowUpdate, UnchangedReason } from './entities/row-update.entity';
import { LedgerFileService } from './ledger-file.service';
import { splitDocumentLines } from './ledger-format';
import { readHoldings } from './ledger-reader';
import { lookupQuote } from './pricing/price-cache-joiner';
import { ScannedLine, scanLines } from './scanner/table-scanner';

function unchanged(line: string, reason: UnchangedReason, code?: string): RowUpdate {
  return { kind: 'unchanged', line, reason, code };
}

// Refreshes market-value cells in the ledger from a price cache.
// Row failures never abort the run: the row is emitted as read.
@Injectable()
export class LedgerUpdaterService {
  private readonly logger = new Logger(LedgerUpdaterService.name);

  constructor(
    private readonly ledgerFile: LedgerFileService,
    private readonly marketPriceService: MarketPriceService,
  ) {}

  /**
   * Load, price, rewrite and save the ledger.
   * @throws NotFoundException when the ledger is missing
   * @throws InternalServerErrorException when it cannot be read or written
   */
  async run(path?: string): Promise<UpdateResultDto> {
    const document = await this.ledgerFile.read(path);
    const linesRead = splitDocumentLines(document.content).length;
    this.logger.log(`Loaded ${linesRead} lines from ${document.path}`);

    const cache = await this.marketPriceService.buildPriceCache(readHoldings(document.content));
    const update = this.updateDocument(document.content, cache);
    this.logger.log(`Rewrote ${update.rowsRewritten} rows, left ${update.rowsUnchanged} unchanged`);

    await this.ledgerFile.write(document.path, update.content);

    return {
      runId: uuidv4(),
      path: document.path,
      linesRead,
      quotesFetched: cache.size,
      rowsRewritten: update.rowsRewritten,
      rowsUnchanged: update.rowsUnchanged,
      outcomes: update.outcomes,
    };
  }

  /** Pure pass over the document; lines other than data rows are copied as-is. */
  updateDocument(content: string, cache: PriceCache): DocumentUpdate {
    const output: string[] = [];
    const outcomes: RowOutcome[] = [];

    for (const scanned of scanLines(splitDocumentLines(content))) {
      if (scanned.kind !== 'row') {
        output.push(scanned.text);
        continue;
      }
      const update = this.updateRow(scanned, cache);
      output.push(update.line);
      outcomes.push(
        update.kind === 'rewritten'
          ? { lineNumber: scanned.lineNumber, kind: update.kind, code: update.code }
          : { lineNumber: scanned.lineNumber, kind: update.kind, code: update.code, reason: update.reason },
      );
    }

    const rowsRewritten = outcomes.filter((outcome) => outcome.kind === 'rewritten').length;
    return {
      content: output.join(''),
      outcomes,
      rowsRewritten,
      rowsUnchanged: outcomes.length - rowsRewritten,
    };
  }

  /** market value = quote price x quantity, written per the column's unit */
  updateRow(scanned: ScannedLine, cache: PriceCache): RowUpdate {
    const line = scanned.text;
    if (!scanned.header) {
      return unchanged(line, 'not_decodable');
    }

    const decoded = decodeRow(scanned.header, line, scanned.section);
    if (!decoded.ok) {
      this.logger.debug(`Line ${scanned.lineNumber} not decodable (${decoded.reason})`);
      return unchanged(line, 'not_decodable');
    }

    const { code, quantity } = decoded.record;
    const quote = lookupQuote(code, cache);
    if (!quote) {
      return unchanged(line, 'no_quote', code);
    }
    if (quantity.isZero()) {
      return unchanged(line, 'zero_quantity', code);
    }
    if (!isValidPrice(quote.price)) {
      return unchanged(line, 'non_positive_price', code);
    }
    const price = toDecimal(quote.price);

    const encoded = encodeCell(scanned.header, line, 'marketValue', price.times(quantity));
    if (!encoded.ok) {
      return unchanged(line, encoded.reason === 'missing_column' ? 'missing_market_value_column' : 'encode_failed', code);
    }
    return { kind: 'rewritten', line: encoded.row, code };
  }
}
