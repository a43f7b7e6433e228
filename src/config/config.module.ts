import { Global, Module } from '@nestjs/common';
import { LedgerConfigService } from './ledger-config.service';
import { validateSettings } from './ledger-settings';

@Global()
@Module({
  providers: [
    {
      provide: LedgerConfigService,
      useFactory: () => new LedgerConfigService(validateSettings(process.env)),
    },
  ],
  exports: [LedgerConfigService],
})
export class ConfigModule {}
