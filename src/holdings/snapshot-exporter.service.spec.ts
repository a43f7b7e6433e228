import { NotFoundException } from '@nestjs/common';
import { Test, TestingModule } from '@nestjs/testing';
import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { LedgerConfigService } from '../config/ledger-config.service';
import { validateSettings } from '../config/ledger-settings';
import { LedgerFileService } from './ledger-file.service';
import { SnapshotExporterService, formatSyncTimestamp } from './snapshot-exporter.service';

const LEDGER = `
## A股持仓
| 代码 | 名称 | 市场 | 成本价 | 持仓数量 | 现价 | 市值 | 持仓占比 | 盈亏 |
|---|---|---|---|---|---|---|---|---|
| 600519 | 贵州茅台 | 沪A | 1650.00 | 10 | 1700.00 | 17000.00 | 50% | +3.03% |
| 510300 | 沪深300ETF | 沪A | 3.80 | 1000 | 3.90 | 3900.00 | 5% | +2.63% |
| 000858 | 五粮液 | 深A | 150.00 | 100 | 155.00 | 15500.00 | 45% | +3.33% |

## 港股持仓
| 代码 | 名称 | 市场 | 成本价 | 持仓数量 | 现价 | 市值 | 持仓占比 | 盈亏 |
|---|---|---|---|---|---|---|---|---|
| 00700 | 腾讯控股 | 港股 | 300.00 | 100 | 320.00 | 32000.00 | 10% | +6.67% |

## 美股持仓
| 代码 | 名称 | 市场 | 成本价 | 持仓数量 | 市值(万USD) | 买入日期 |
|---|---|---|---|---|---|---|
| AAPL | Apple | US | 150.00 | 10 | 0.17 | 2023-01-01 |
| RSU_AMZN | Amazon | US | 0.00 | 50 | - | 2023-06-01 |

## 基金持仓
| 代码 | 名称 | 类型 | 成立日 | 成本价 | 持仓份额 | 净值 | 买入日期 |
|---|---|---|---|---|---|---|---|
| 110011 | 易方达中小盘 | 混合型 | 2008-01-01 | 2.500 | 1000.00 | 3.000 | 2023-01-01 |

## 观察列表
| 代码 | 名称 | 持仓数量 |
|---|---|---|
| 9988 | 阿里巴巴 | 0 |
`;

describe('SnapshotExporterService', () => {
  let service: SnapshotExporterService;
  let workDir: string;
  let ledgerPath: string;

  beforeEach(async () => {
    workDir = await mkdtemp(join(tmpdir(), 'snapshot-exporter-'));
    ledgerPath = join(workDir, 'Holdings.md');

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        LedgerFileService,
        SnapshotExporterService,
        {
          provide: LedgerConfigService,
          useValue: new LedgerConfigService(
            validateSettings({ HOLDINGS_PATH: ledgerPath, SNAPSHOT_OUTPUT: join(workDir, 'out', 'snapshot.json') }),
          ),
        },
      ],
    }).compile();

    service = module.get<SnapshotExporterService>(SnapshotExporterService);
  });

  afterEach(async () => {
    await rm(workDir, { recursive: true, force: true });
  });

  describe('formatSyncTimestamp', () => {
    it('should format UTC time to the second', () => {
      expect(formatSyncTimestamp(new Date('2024-05-01T08:30:00.123Z'))).toBe('2024-05-01T08:30:00Z');
    });
  });

  describe('buildSnapshot', () => {
    it('should export A-share ETFs, A-share stocks, HK and US holdings in that order', () => {
      const snapshot = service.buildSnapshot(LEDGER, new Date('2024-05-01T08:30:00.123Z'));

      expect(snapshot).toEqual({
        sync_timestamp: '2024-05-01T08:30:00Z',
        holdings: [
          { symbol: '510300', market: 'CN_SH', quantity: 1000, avg_cost_local: 3.8, currency: 'CNY' },
          { symbol: '600519', market: 'CN_SH', quantity: 10, avg_cost_local: 1650, currency: 'CNY' },
          { symbol: '000858', market: 'CN_SZ', quantity: 100, avg_cost_local: 150, currency: 'CNY' },
          { symbol: '00700', market: 'HK', quantity: 100, avg_cost_local: 300, currency: 'HKD' },
          {
            symbol: 'AAPL',
            market: 'US',
            quantity: 10,
            avg_cost_local: 150,
            currency: 'USD',
            market_price: 170,
            market_value_usd: 1700,
          },
          { symbol: 'RSU_AMZN', market: 'US', quantity: 50, avg_cost_local: 0, currency: 'USD' },
        ],
      });
    });

    it('should omit market fields for US rows without a market value', () => {
      const snapshot = service.buildSnapshot(LEDGER);
      const grant = snapshot.holdings.find((holding) => holding.symbol === 'RSU_AMZN');

      expect(grant).toBeDefined();
      expect(grant).not.toHaveProperty('market_price');
      expect(grant).not.toHaveProperty('market_value_usd');
    });

    it('should report a zero price for US rows with a value but no quantity', () => {
      const content = [
        '## 美股持仓',
        '| 代码 | 名称 | 成本价 | 持仓数量 | 市值(万USD) |',
        '|---|---|---|---|---|',
        '| TSLA | Tesla | 200.00 | 0 | 1.5 |',
      ].join('\n');

      const [tesla] = service.buildSnapshot(content).holdings;

      expect(tesla.market_price).toBe(0);
      expect(tesla.market_value_usd).toBe(15000);
    });

    it('should export a repeated A-share or HK code once, with the last row winning', () => {
      const content = [
        '## A股持仓',
        '| 代码 | 名称 | 市场 | 成本价 | 持仓数量 |',
        '|---|---|---|---|---|',
        '| 600519 | 贵州茅台 | 沪A | 1600.00 | 10 |',
        '| 000858 | 五粮液 | 深A | 150.00 | 100 |',
        '| 600519 | 贵州茅台 | 沪A | 1650.00 | 20 |',
        '',
        '## 港股持仓',
        '| 代码 | 名称 | 市场 | 成本价 | 持仓数量 |',
        '|---|---|---|---|---|',
        '| 00700 | 腾讯控股 | 港股 | 300.00 | 100 |',
        '| 00700 | 腾讯控股 | 港股 | 310.00 | 200 |',
        '',
        '## 美股持仓',
        '| 代码 | 名称 | 市场 | 成本价 | 持仓数量 |',
        '|---|---|---|---|---|',
        '| AAPL | Apple | US | 150.00 | 10 |',
        '| AAPL | Apple | US | 160.00 | 5 |',
      ].join('\n');

      const holdings = service.buildSnapshot(content).holdings;

      expect(holdings.map((holding) => [holding.symbol, holding.quantity, holding.avg_cost_local])).toEqual([
        ['600519', 20, 1650],
        ['000858', 100, 150],
        ['00700', 200, 310],
        ['AAPL', 10, 150],
        ['AAPL', 5, 160],
      ]);
    });

    it('should return no holdings for a document without tables', () => {
      expect(service.buildSnapshot('# Holdings\n\nNothing yet.\n').holdings).toEqual([]);
    });
  });

  describe('export', () => {
    it('should write the snapshot to the configured output', async () => {
      await writeFile(ledgerPath, LEDGER, 'utf-8');

      const result = await service.export();

      const outputPath = join(workDir, 'out', 'snapshot.json');
      const written = await readFile(outputPath, 'utf-8');
      const parsed: unknown = JSON.parse(written);
      expect(result.output).toBe(outputPath);
      expect(result.holdings).toBe(6);
      expect(parsed).toMatchObject({ sync_timestamp: result.syncTimestamp });
      expect(written.endsWith('}\n')).toBe(true);
    });

    it('should honour an explicit output path', async () => {
      await writeFile(ledgerPath, LEDGER, 'utf-8');
      const outputPath = join(workDir, 'custom.json');

      const result = await service.export(outputPath);

      expect(result.output).toBe(outputPath);
      expect(await readFile(outputPath, 'utf-8')).toContain('"symbol": "RSU_AMZN"');
    });

    it('should fail when the ledger is missing', async () => {
      await expect(service.export()).rejects.toThrow(NotFoundException);
    });
  });
});
