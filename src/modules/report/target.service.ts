import { Injectable, Logger } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository } from 'typeorm';
import { PartyTarget } from './entities/party-target.entity';
import { StoreWriteResult, WithDiagnostics, errorMessage } from '../../utils/diagnostics';

/**
 * TargetService - per-party freight targets
 */
@Injectable()
export class TargetService {
  private readonly logger = new Logger(TargetService.name);

  constructor(
    @InjectRepository(PartyTarget)
    private readonly targetRepo: Repository<PartyTarget>,
  ) {}

  async findAll(): Promise<PartyTarget[]> {
    return this.targetRepo.find({ order: { party_name: 'ASC' } });
  }

  /**
   * Targets keyed by party for one report pass. An unreadable store gives
   * an empty map (every target null) and a diagnostic.
   */
  async loadTargets(): Promise<WithDiagnostics<Map<string, number>>> {
    try {
      const rows = await this.findAll();
      return {
        data: new Map(rows.map((row) => [row.party_name, row.target])),
        diagnostics: [],
      };
    } catch (error) {
      const message = errorMessage(error);
      this.logger.warn({ event: 'target_read_failed', error: message });
      return {
        data: new Map(),
        diagnostics: [
          {
            code: 'SOURCE_UNAVAILABLE',
            message: `Could not read party_target: ${message}`,
            context: { table: 'party_target' },
          },
        ],
      };
    }
  }

  /**
   * Insert or replace one party's target in a single statement
   */
  async upsert(partyName: string, target: number): Promise<StoreWriteResult> {
    try {
      await this.targetRepo.upsert({ party_name: partyName, target }, { conflictPaths: ['party_name'] });
      this.logger.log({ event: 'target_upserted', party: partyName, target });
      return { success: true };
    } catch (error) {
      const message = errorMessage(error);
      this.logger.error({ event: 'target_upsert_failed', party: partyName, error: message });
      return { success: false, error: message };
    }
  }
}
