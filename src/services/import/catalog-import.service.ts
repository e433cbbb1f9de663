import fs from 'fs/promises';
import { parse } from 'csv-parse/sync';
import { z } from 'zod';
import { ContentStore, ContentWriter } from '../../db/content.store.js';
import { AppError, ImportError } from '../../errors.js';
import { logger } from '../../config/logger.js';
import { ImportResult, NewCatalogRecord } from '../../types/models.js';
import { FacetService } from '../catalog/facet.service.js';
import { normalizeRow, resolveColumns } from './row-normalizer.js';

const rowsSchema = z.array(z.array(z.string()));

export interface CatalogImportOptions {
  batchSize: number;
}

interface BatchCounts {
  inserted: number;
  skipped: number;
}

/**
 * Parse CSV text into normalized records. Throws ImportError on malformed
 * CSV, missing columns or a row without show_id.
 */
export function parseCatalogCsv(content: string): NewCatalogRecord[] {
  let parsed: unknown;
  try {
    parsed = parse(content, { bom: true, skip_empty_lines: true, trim: true });
  } catch (error) {
    throw new ImportError('Failed to parse import file', error);
  }

  const result = rowsSchema.safeParse(parsed);
  if (!result.success) {
    throw new ImportError('Import file did not parse into rows of text cells');
  }

  const rows = result.data;
  if (rows.length === 0) {
    throw new ImportError('Import file is empty');
  }

  const [header, ...data] = rows;
  const columns = resolveColumns(header);
  return data.map((cells, i) => normalizeRow(cells, columns, i + 1));
}

export class CatalogImportService {
  private readonly log = logger.child('import');

  constructor(
    private readonly store: ContentStore,
    private readonly facets: FacetService,
    private readonly options: CatalogImportOptions
  ) {}

  async importFile(csvPath: string): Promise<ImportResult> {
    this.log.info('Reading import file', { csvPath });

    let content: string;
    try {
      content = await fs.readFile(csvPath, 'utf-8');
    } catch (error) {
      this.log.error('Failed to read import file', { csvPath, error });
      throw new ImportError(`Failed to read import file ${csvPath}`, error);
    }

    let records: NewCatalogRecord[];
    try {
      records = parseCatalogCsv(content);
    } catch (error) {
      this.log.error('Failed to parse import file', { csvPath, error });
      throw error;
    }
    this.log.info('Parsed import file', { csvPath, rows: records.length });

    return this.importRecords(records);
  }

  /**
   * Insert records whose show_id is not yet stored, committing every
   * `batchSize` rows. A failing batch is rolled back and aborts the run;
   * earlier batches stay committed.
   */
  async importRecords(records: NewCatalogRecord[]): Promise<ImportResult> {
    const { batchSize } = this.options;
    let inserted = 0;
    let skipped = 0;

    for (let start = 0; start < records.length; start += batchSize) {
      const end = Math.min(start + batchSize, records.length);
      const batch = records.slice(start, end);

      try {
        const counts = await this.store.transaction((writer) => this.writeBatch(writer, batch));
        inserted += counts.inserted;
        skipped += counts.skipped;
      } catch (error) {
        this.log.error('Import batch failed, rolled back', { start, end, error });
        if (error instanceof AppError) throw error;
        throw new ImportError(`Import failed at rows ${start + 1}-${end}`, error);
      }

      this.log.info(`Processed records: ${end}/${records.length}`);
    }

    const statistics = await this.facets.getStatistics();

    this.log.info('Import completed', { processed: records.length, inserted, skipped });

    return {
      status: 'success',
      records_processed: records.length,
      records_inserted: inserted,
      records_updated: 0,
      records_skipped: skipped,
      statistics,
    };
  }

  private async writeBatch(
    writer: ContentWriter,
    batch: NewCatalogRecord[]
  ): Promise<BatchCounts> {
    const counts: BatchCounts = { inserted: 0, skipped: 0 };

    for (const record of batch) {
      if (await writer.existsByShowId(record.show_id)) {
        counts.skipped++;
      } else {
        await writer.insert(record);
        counts.inserted++;
      }
    }

    return counts;
  }
}
