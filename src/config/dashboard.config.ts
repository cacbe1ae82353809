import { ConfigType, registerAs } from '@nestjs/config';

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*(\.[A-Za-z_][A-Za-z0-9_]*)?$/;

export function readInt(value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === '') {
    return fallback;
  }
  const parsed = Number.parseInt(value, 10);
  if (Number.isNaN(parsed) || parsed < 0) {
    throw new Error(`Expected a non-negative integer, got "${value}"`);
  }
  return parsed;
}

function readIdentifier(value: string | undefined, fallback: string): string {
  const name = value?.trim() || fallback;
  if (!IDENTIFIER.test(name)) {
    throw new Error(`Invalid table name "${name}"`);
  }
  return name;
}

/**
 * Engine settings read from the environment (.env via ConfigModule)
 */
export const dashboardConfig = registerAs('dashboard', () => ({
  /** Trips younger than this many days are not expected to have a CN yet */
  pendingCnMinAgeDays: readInt(process.env.PENDING_CN_MIN_AGE_DAYS, 3),
  localLoadMaxDistanceKm: readInt(process.env.LOCAL_LOAD_MAX_DISTANCE_KM, 100),
  tripLogTable: readIdentifier(process.env.TRIP_LOG_TABLE, 'trip_log'),
  consignmentTable: readIdentifier(process.env.CONSIGNMENT_TABLE, 'consignment_note'),
}));

export type DashboardConfig = ConfigType<typeof dashboardConfig>;
