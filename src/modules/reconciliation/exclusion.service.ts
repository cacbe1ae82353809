import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { PendingCnExclusion } from './entities/pending-cn-exclusion.entity';
import { StoreWriteResult, WithDiagnostics, errorMessage } from '../../utils/diagnostics';

/**
 * ExclusionService - operator list of trips that are not pending a CN
 *
 * Writes are single statements; a failed write reports itself and leaves
 * the stored list as it was.
 */
@Injectable()
export class ExclusionService {
  private readonly logger = new Logger(ExclusionService.name);

  constructor(
    @InjectRepository(PendingCnExclusion)
    private readonly exclusionRepo: Repository<PendingCnExclusion>,
  ) {}

  /**
   * All exclusions in insertion order
   */
  async findAll(): Promise<PendingCnExclusion[]> {
    return this.exclusionRepo.find({ order: { created_at: 'ASC', trip_id: 'ASC' } });
  }

  /**
   * Excluded trip ids for one reconciliation pass. An unreadable store
   * gives an empty set and a diagnostic.
   */
  async loadIds(): Promise<WithDiagnostics<Set<string>>> {
    try {
      const rows = await this.findAll();
      return { data: new Set(rows.map((row) => row.trip_id)), diagnostics: [] };
    } catch (error) {
      const message = errorMessage(error);
      this.logger.warn({ event: 'exclusion_read_failed', error: message });
      return {
        data: new Set(),
        diagnostics: [
          {
            code: 'SOURCE_UNAVAILABLE',
            message: `Could not read pending_cn_exclusion: ${message}`,
            context: { table: 'pending_cn_exclusion' },
          },
        ],
      };
    }
  }

  async add(tripId: string, reason?: string): Promise<StoreWriteResult> {
    try {
      await this.exclusionRepo.upsert(
        { trip_id: tripId, reason: reason ?? null },
        { conflictPaths: ['trip_id'] },
      );
      this.logger.log({ event: 'exclusion_added', trip_id: tripId });
      return { success: true };
    } catch (error) {
      const message = errorMessage(error);
      this.logger.error({ event: 'exclusion_add_failed', trip_id: tripId, error: message });
      return { success: false, error: message };
    }
  }

  /**
   * Remove a trip from the list; removing an absent id is a no-op
   */
  async remove(tripId: string): Promise<StoreWriteResult> {
    try {
      await this.exclusionRepo.delete({ trip_id: tripId });
      this.logger.log({ event: 'exclusion_removed', trip_id: tripId });
      return { success: true };
    } catch (error) {
      const message = errorMessage(error);
      this.logger.error({ event: 'exclusion_remove_failed', trip_id: tripId, error: message });
      return { success: false, error: message };
    }
  }
}
