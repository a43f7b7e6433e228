import { Injectable } from '@nestjs/common';
import { LedgerSettings } from './ledger-settings';

// Default ledger locations, relative to the working directory.
export const LEDGER_CANDIDATES = ['股市信息/Config/Holdings.md', 'Config/Holdings.md'];

export interface QuotePolicySettings {
  timeoutMs: number;
  maxRetries: number;
}

@Injectable()
export class LedgerConfigService {
  constructor(private readonly settings: LedgerSettings) {}

  /** Explicit ledger path, if one is configured */
  get holdingsPath(): string | undefined {
    return this.settings.HOLDINGS_PATH;
  }

  get ledgerCandidates(): string[] {
    return LEDGER_CANDIDATES;
  }

  get snapshotOutput(): string {
    return this.settings.SNAPSHOT_OUTPUT;
  }

  get port(): number {
    return this.settings.PORT;
  }

  get finnhubApiKey(): string | undefined {
    return this.settings.FINNHUB_API_KEY;
  }

  get quotePolicy(): QuotePolicySettings {
    return {
      timeoutMs: this.settings.QUOTE_TIMEOUT_MS,
      maxRetries: this.settings.QUOTE_MAX_RETRIES,
    };
  }
}
