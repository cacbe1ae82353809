import { Entity, Column, PrimaryColumn, UpdateDateColumn, ValueTransformer } from 'typeorm';

/**
 * pg returns NUMERIC as a string
 */
const numericTransformer: ValueTransformer = {
  to: (value: number) => value,
  from: (value: string | number) => Number(value),
};

/**
 * PartyTarget entity - freight target per canonical party
 */
@Entity('party_target')
export class PartyTarget {
  @PrimaryColumn({ type: 'varchar', length: 255 })
  party_name!: string;

  @Column({ type: 'decimal', precision: 12, scale: 2, transformer: numericTransformer })
  target!: number;

  @UpdateDateColumn({ type: 'timestamptz' })
  updated_at!: Date;

  /**
   * Convert to safe object for API responses
   */
  toSafeObject() {
    return {
      party_name: this.party_name,
      target: this.target,
      updated_at: this.updated_at,
    };
  }
}
