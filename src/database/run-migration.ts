/* eslint-disable no-console */
/**
 * Manual migration runner for the SQL files in src/database/migrations
 * Usage: npm run migrate -- <migration-file>
 */

import 'reflect-metadata';
import { DataSource } from 'typeorm';
import * as fs from 'fs';
import * as path from 'path';
import { splitSqlStatements } from './sql-splitter';

// Same path from src/database and dist/database
const MIGRATIONS_DIR = path.resolve(__dirname, '..', '..', 'src', 'database', 'migrations');

async function runMigration(migrationFile: string): Promise<void> {
  const dataSource = new DataSource({
    type: 'postgres',
    host: process.env.DB_HOST || 'localhost',
    port: parseInt(process.env.DB_PORT || '5432', 10),
    username: process.env.DB_USERNAME || 'postgres',
    password: process.env.DB_PASSWORD || 'postgres',
    database: process.env.DB_DATABASE || 'trip_ledger',
  });

  try {
    console.log('Connecting to database...');
    await dataSource.initialize();

    const migrationPath = path.join(MIGRATIONS_DIR, migrationFile);
    console.log(`Reading migration: ${migrationPath}`);
    const statements = splitSqlStatements(fs.readFileSync(migrationPath, 'utf-8'));

    console.log(`Executing ${statements.length} SQL statements...`);
    let executed = 0;
    for (const statement of statements) {
      try {
        await dataSource.query(statement);
        executed++;
      } catch (error: unknown) {
        console.error(`\nFailed at statement ${executed + 1}:`);
        console.error(statement.substring(0, 200));
        throw error;
      }
    }

    const tables: unknown = await dataSource.query(`
      SELECT table_name
      FROM information_schema.tables
      WHERE table_schema = 'public'
        AND table_name IN ('party_target', 'pending_cn_exclusion')
      ORDER BY table_name;
    `);
    console.log('Store tables:');
    console.table(tables);

    console.log(`Migration executed successfully (${executed} statements)`);
  } finally {
    await dataSource.destroy();
  }
}

const migrationFile = process.argv[2] || '001_dashboard_stores.sql';

runMigration(migrationFile)
  .then(() => {
    process.exit(0);
  })
  .catch((error: unknown) => {
    console.error('Migration failed:', error instanceof Error ? error.message : error);
    process.exit(1);
  });
