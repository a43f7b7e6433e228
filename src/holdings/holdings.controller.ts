import { Controller, Get, HttpCode, HttpStatus, Post } from '@nestjs/common';
import { ExportResultDto, HoldingsSnapshot } from './dto/holdings-snapshot.dto';
import { UpdateResultDto } from './dto/update-result.dto';
import { LedgerUpdaterService } from './ledger-updater.service';
import { SnapshotExporterService } from './snapshot-exporter.service';

// Paths come from configuration only; requests cannot name files.
@Controller('holdings')
export class HoldingsController {
  constructor(
    private readonly updater: LedgerUpdaterService,
    private readonly exporter: SnapshotExporterService,
  ) {}

  /**
   * Refreshes market values in the ledger and saves it.
   *
   * POST /holdings/update
   */
  @Post('update')
  @HttpCode(HttpStatus.OK)
  update(): Promise<UpdateResultDto> {
    return this.updater.run();
  }

  /**
   * Current ledger as a normalised snapshot.
   *
   * GET /holdings/snapshot
   */
  @Get('snapshot')
  @HttpCode(HttpStatus.OK)
  getSnapshot(): Promise<HoldingsSnapshot> {
    return this.exporter.snapshot();
  }

  /**
   * Writes the snapshot to SNAPSHOT_OUTPUT.
   *
   * POST /holdings/export
   */
  @Post('export')
  @HttpCode(HttpStatus.OK)
  export(): Promise<ExportResultDto> {
    return this.exporter.export();
  }
}
