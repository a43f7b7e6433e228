import Decimal from 'decimal.js';
import { AShareAssetType } from '../entities/holding-record.entity';
import { Section } from '../entities/section.enum';
import { DEFAULT_BUY_DATE, splitCells } from '../ledger-format';
import { decodeRow, encodeCell, formatMarketValue, resolveColumnRoles } from './row-codec';

const US_HEADER = splitCells('| 代码 | 名称 | 市场 | 成本价 | 持仓数量 | 市值(万USD) | 买入日期 |');
const A_SHARE_HEADER = splitCells('| 代码 | 名称 | 市场 | 成本价 | 持仓数量 | 现价 | 市值 | 持仓占比 | 盈亏 |');
const FUND_HEADER = splitCells('| 代码 | 名称 | 类型 | 成立日 | 成本价 | 持仓份额 | 净值 | 买入日期 |');

describe('row-codec', () => {
  describe('resolveColumnRoles', () => {
    it('should resolve roles by header name rather than position', () => {
      expect(resolveColumnRoles(FUND_HEADER)).toEqual({
        code: 0,
        name: 1,
        costBasis: 4,
        quantity: 5,
        marketValue: undefined,
        buyDate: 7,
        fundType: 2,
        marketValueInTenThousands: false,
      });
    });

    it('should match market value columns whatever their unit suffix', () => {
      const roles = resolveColumnRoles(US_HEADER);

      expect(roles.marketValue).toBe(5);
      expect(roles.marketValueInTenThousands).toBe(true);
    });

    it('should match the code column exactly', () => {
      expect(resolveColumnRoles(['基金代码', '名称']).code).toBeUndefined();
    });
  });

  describe('decodeRow', () => {
    it('should decode a US row and undo the ten-thousand scaling', () => {
      const result = decodeRow(US_HEADER, '| AAPL | Apple | US | 150.00 | 10 | 0.17 | 2023-03-15 |\n', Section.US);

      if (!result.ok || result.record.section !== Section.US) {
        throw new Error('expected a US record');
      }
      expect(result.record.code).toBe('AAPL');
      expect(result.record.name).toBe('Apple');
      expect(result.record.costBasis.toNumber()).toBe(150);
      expect(result.record.quantity.toNumber()).toBe(10);
      expect(result.record.marketValue?.toNumber()).toBe(1700);
      expect(result.record.buyDate).toBe('2023-03-15');
      expect(result.record.underlyingTicker).toBe('AAPL');
      expect(result.record.isSyntheticGrant).toBe(false);
    });

    it('should keep RSU codes intact and expose the underlying ticker', () => {
      const result = decodeRow(US_HEADER, '| RSU_AMZN | Amazon | US | 0.00 | 50 | 0.65 | 2023-06-01 |', Section.US);

      expect(result).toMatchObject({
        ok: true,
        record: { code: 'RSU_AMZN', underlyingTicker: 'AMZN', isSyntheticGrant: true },
      });
    });

    it('should classify A-share ETFs by name or code prefix', () => {
      const stock = decodeRow(
        A_SHARE_HEADER,
        '| 600519 | 贵州茅台 | 沪A | 1650.00 | 10 | 1700.00 | 17000.00 | 50% | +3.03% |',
        Section.A_SHARE,
      );
      const etf = decodeRow(
        A_SHARE_HEADER,
        '| 510300 | 沪深300 | 沪A | 3.80 | 1000 | 3.90 | 3900.00 | 5% | +2.63% |',
        Section.A_SHARE,
      );

      expect(stock).toMatchObject({ ok: true, record: { assetType: AShareAssetType.STOCK } });
      expect(etf).toMatchObject({ ok: true, record: { assetType: AShareAssetType.ETF } });
      if (stock.ok) {
        expect(stock.record.marketValue?.toNumber()).toBe(17000);
      }
    });

    it('should read fund share counts and types', () => {
      const result = decodeRow(
        FUND_HEADER,
        '| 110011 | 易方达中小盘 | 混合型 | 2008-01-01 | 2.500 | 1000.00 | 3.000 | 2023-01-01 |',
        Section.FUND,
      );

      expect(result).toMatchObject({ ok: true, record: { section: Section.FUND, fundType: '混合型' } });
      if (result.ok) {
        expect(result.record.quantity.toNumber()).toBe(1000);
        expect(result.record.costBasis.toNumber()).toBe(2.5);
        expect(result.record.marketValue).toBeUndefined();
      }
    });

    it('should coerce placeholder cells to zero and default the buy date', () => {
      const result = decodeRow(US_HEADER, '| MSFT | Microsoft | US | - |  | - | - |', Section.US);

      if (!result.ok) {
        throw new Error(`unexpected failure: ${result.reason}`);
      }
      expect(result.record.costBasis.isZero()).toBe(true);
      expect(result.record.quantity.isZero()).toBe(true);
      expect(result.record.marketValue).toBeUndefined();
      expect(result.record.buyDate).toBe(DEFAULT_BUY_DATE);
    });

    it('should accept thousands separators', () => {
      const result = decodeRow(US_HEADER, '| AAPL | Apple | US | 1,150.00 | 1,000 | 17 | 2023-01-01 |', Section.US);

      if (!result.ok) {
        throw new Error(`unexpected failure: ${result.reason}`);
      }
      expect(result.record.costBasis.toNumber()).toBe(1150);
      expect(result.record.quantity.toNumber()).toBe(1000);
    });

    it('should leave an unreadable market value unset instead of failing', () => {
      const result = decodeRow(US_HEADER, '| AAPL | Apple | US | 150.00 | 10 | n/a | 2023-01-01 |', Section.US);

      expect(result.ok).toBe(true);
      if (result.ok) {
        expect(result.record.marketValue).toBeUndefined();
      }
    });

    it('should report rows with fewer cells than the header', () => {
      expect(decodeRow(US_HEADER, '| AAPL | Apple | US |', Section.US)).toEqual({ ok: false, reason: 'short_row' });
    });

    it('should report unparseable quantities and costs', () => {
      expect(decodeRow(US_HEADER, '| AAPL | Apple | US | 150.00 | ten | 0.17 | 2023-01-01 |', Section.US)).toEqual({
        ok: false,
        reason: 'invalid_number',
      });
      expect(decodeRow(US_HEADER, '| AAPL | Apple | US | -5 | 10 | 0.17 | 2023-01-01 |', Section.US)).toEqual({
        ok: false,
        reason: 'invalid_number',
      });
    });

    it('should report an empty code cell', () => {
      expect(decodeRow(US_HEADER, '|  | Apple | US | 150.00 | 10 | 0.17 | 2023-01-01 |', Section.US)).toEqual({
        ok: false,
        reason: 'empty_code',
      });
    });

    it('should report headers lacking code or quantity columns', () => {
      expect(decodeRow(['名称', '数量'], '| Apple | 10 |', Section.US)).toEqual({
        ok: false,
        reason: 'missing_code_column',
      });
      expect(decodeRow(['代码', '名称'], '| AAPL | Apple |', Section.US)).toEqual({
        ok: false,
        reason: 'missing_quantity_column',
      });
    });
  });

  describe('formatMarketValue', () => {
    it('should keep two decimals for small ten-thousand values', () => {
      expect(formatMarketValue('市值(万USD)', new Decimal(1700))).toBe('0.17');
    });

    it('should drop decimals once the scaled value reaches 100', () => {
      expect(formatMarketValue('市值(万USD)', new Decimal(1700000))).toBe('170');
      expect(formatMarketValue('市值(万)', new Decimal(1234567))).toBe('123');
    });

    it('should always keep two decimals for absolute columns', () => {
      expect(formatMarketValue('市值', new Decimal(32000))).toBe('32000.00');
      expect(formatMarketValue('市值', new Decimal('1700.125'))).toBe('1700.13');
    });
  });

  describe('encodeCell', () => {
    it('should rewrite only the market value cell', () => {
      const result = encodeCell(
        US_HEADER,
        '| AAPL | Apple | US | 150.00 | 10 | 0.00 | 2023-01-01 |',
        'marketValue',
        new Decimal(1700),
      );

      expect(result).toEqual({ ok: true, row: '| AAPL | Apple | US | 150.00 | 10 | 0.17 | 2023-01-01 |\n' });
    });

    it('should normalise cell padding and keep extra trailing cells', () => {
      const result = encodeCell(
        ['代码', '持仓数量', '市值'],
        '|600519|10|  0  | spare |\n',
        'marketValue',
        new Decimal(17000),
      );

      expect(result).toEqual({ ok: true, row: '| 600519 | 10 | 17000.00 | spare |\n' });
    });

    it('should keep CRLF terminators', () => {
      const result = encodeCell(['代码', '持仓数量', '市值'], '| 600519 | 10 | 0 |\r\n', 'marketValue', new Decimal(1));

      expect(result).toEqual({ ok: true, row: '| 600519 | 10 | 1.00 |\r\n' });
    });

    it('should encode cost basis and quantity cells', () => {
      const header = ['代码', '成本价', '持仓数量'];

      expect(encodeCell(header, '| AAPL | 1 | 2 |', 'costBasis', new Decimal('150.5'))).toEqual({
        ok: true,
        row: '| AAPL | 150.50 | 2 |\n',
      });
      expect(encodeCell(header, '| AAPL | 1 | 2 |', 'quantity', new Decimal('12.5'))).toEqual({
        ok: true,
        row: '| AAPL | 1 | 12.5 |\n',
      });
    });

    it('should fail when the header has no such column', () => {
      expect(encodeCell(['代码', '持仓数量'], '| AAPL | 10 |', 'marketValue', new Decimal(1))).toEqual({
        ok: false,
        reason: 'missing_column',
      });
    });

    it('should fail on short rows', () => {
      expect(encodeCell(US_HEADER, '| AAPL | Apple |', 'marketValue', new Decimal(1))).toEqual({
        ok: false,
        reason: 'short_row',
      });
    });
  });
});
