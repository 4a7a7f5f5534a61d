import { Injectable } from '@nestjs/common';
import { mkdir, writeFile } from 'fs/promises';
import { dirname, resolve } from 'path';
import {
  OutcomeRecord,
  OutcomeStorePort,
} from '../../../application/ports/output/outcome-store.port';
import { PinoLoggerService } from '../../../shared/logging/pino-logger.service';

/**
 * JSON File Outcome Store Adapter
 * Writes one run record as pretty-printed JSON, replacing any previous file
 */
@Injectable()
export class JsonFileOutcomeStoreAdapter implements OutcomeStorePort {
  private readonly logger: PinoLoggerService;
  constructor(logger: PinoLoggerService) {
    this.logger = logger.forContext(JsonFileOutcomeStoreAdapter.name);
  }

  async save(record: OutcomeRecord, destination: string): Promise<string> {
    const path = resolve(destination);

    await mkdir(dirname(path), { recursive: true });
    await writeFile(path, `${JSON.stringify(record, null, 2)}\n`, 'utf-8');

    this.logger.info({ path, handle: record.handle }, 'Outcome record written');
    return path;
  }
}
