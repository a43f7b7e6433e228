import { Injectable, InternalServerErrorException, Logger, NotFoundException } from '@nestjs/common';
import { existsSync } from 'node:fs';
import { mkdir, readFile, rename, rm, writeFile } from 'node:fs/promises';
import { dirname, resolve } from 'node:path';
import { LedgerConfigService } from '../config/ledger-config.service';

export interface LedgerDocument {
  path: string;
  content: string;
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

// Whole-file ledger and snapshot I/O.
// Writes land in a sibling temp file that is renamed over the target,
// so readers see either the old or the new content.
@Injectable()
export class LedgerFileService {
  private readonly logger = new Logger(LedgerFileService.name);

  constructor(private readonly config: LedgerConfigService) {}

  /**
   * Explicit path, then HOLDINGS_PATH, then the first existing
   * default location.
   * @throws NotFoundException when no ledger can be located
   */
  resolvePath(explicitPath?: string): string {
    const configured = explicitPath ?? this.config.holdingsPath;
    if (configured) {
      return resolve(configured);
    }

    const found = this.config.ledgerCandidates.map((candidate) => resolve(candidate)).find((path) => existsSync(path));
    if (!found) {
      throw new NotFoundException(
        `Holdings file not found; tried ${this.config.ledgerCandidates.join(', ')}`,
      );
    }
    return found;
  }

  async read(explicitPath?: string): Promise<LedgerDocument> {
    const path = this.resolvePath(explicitPath);
    try {
      const content = await readFile(path, 'utf-8');
      return { path, content };
    } catch (error: unknown) {
      if (isErrnoException(error) && (error.code === 'ENOENT' || error.code === 'EISDIR')) {
        throw new NotFoundException(`Holdings file not found: ${path}`);
      }
      throw new InternalServerErrorException(`Failed to read ${path}: ${errorMessage(error)}`);
    }
  }

  async write(path: string, content: string): Promise<void> {
    const tempPath = `${path}.${process.pid}.tmp`;
    try {
      await mkdir(dirname(path), { recursive: true });
      await writeFile(tempPath, content, 'utf-8');
      await rename(tempPath, path);
    } catch (error: unknown) {
      await rm(tempPath, { force: true });
      throw new InternalServerErrorException(`Failed to write ${path}: ${errorMessage(error)}`);
    }
    this.logger.log(`Saved ${path}`);
  }

  async writeJson(path: string, data: unknown): Promise<void> {
    await this.write(path, `${JSON.stringify(data, null, 2)}\n`);
  }
}
