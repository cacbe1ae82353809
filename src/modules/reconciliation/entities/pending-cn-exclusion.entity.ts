import { Entity, Column, PrimaryColumn, CreateDateColumn } from 'typeorm';

/**
 * PendingCnExclusion entity - trips an operator has marked as not pending
 *
 * Append and delete only; rows are never updated.
 */
@Entity('pending_cn_exclusion')
export class PendingCnExclusion {
  @PrimaryColumn({ type: 'varchar', length: 100 })
  trip_id!: string;

  @Column({ type: 'text', nullable: true })
  reason!: string | null;

  @CreateDateColumn({ type: 'timestamptz' })
  created_at!: Date;

  /**
   * Convert to safe object for API responses
   */
  toSafeObject() {
    return {
      trip_id: this.trip_id,
      reason: this.reason,
      created_at: this.created_at,
    };
  }
}
