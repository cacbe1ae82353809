import { Injectable, Logger } from '@nestjs/common';
import { InjectDataSource } from '@nestjs/typeorm';
import { DataSource } from 'typeorm';
import { errorMessage, errorStack } from '../utils/diagnostics';

export type RawRow = Record<string, unknown>;

function isRawRow(value: unknown): value is RawRow {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Database service for raw reads of the upstream source tables
 *
 * Source tables change column names between revisions, so they are read
 * with plain SQL and mapped in the ingest layer instead of through
 * entities.
 */
@Injectable()
export class DatabaseService {
  private readonly logger = new Logger(DatabaseService.name);

  constructor(
    @InjectDataSource()
    private readonly dataSource: DataSource,
  ) {}

  /**
   * Execute a read query and return its rows as plain objects
   *
   * @throws the driver error after logging it
   */
  async queryRows(query: string): Promise<RawRow[]> {
    try {
      const result: unknown = await this.dataSource.query(query);
      if (!Array.isArray(result)) {
        return [];
      }
      return result.filter(isRawRow);
    } catch (error) {
      this.logger.error(`Query execution failed: ${errorMessage(error)}`, errorStack(error));
      throw error;
    }
  }
}
