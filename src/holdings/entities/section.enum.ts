// Asset-class partitions of the ledger, picked by "## " headings.
export enum Section {
  A_SHARE = 'A_SHARE',
  HK = 'HK',
  FUND = 'FUND',
  US = 'US',
  OTHER = 'OTHER',
}
