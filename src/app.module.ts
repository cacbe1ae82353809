import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { ThrottlerModule, ThrottlerGuard } from '@nestjs/throttler';
import { APP_GUARD } from '@nestjs/core';
import { dashboardConfig } from './config/dashboard.config';
import { DatabaseModule } from './database/database.module';
import { GazetteerModule } from './modules/gazetteer/gazetteer.module';
import { IngestModule } from './modules/ingest/ingest.module';
import { ReconciliationModule } from './modules/reconciliation/reconciliation.module';
import { ReportModule } from './modules/report/report.module';

@Module({
  imports: [
    // Global configuration module
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: '.env',
      load: [dashboardConfig],
    }),

    // Global rate limiting module
    ThrottlerModule.forRoot([{
      ttl: 60000, // Time window in milliseconds (60 seconds)
      limit: 100, // Max requests per TTL window per IP
    }]),

    // Database module with TypeORM
    DatabaseModule,

    // Classification tables
    GazetteerModule,

    // Source reads and normalization
    IngestModule,

    // Ledger, pending CN and exclusions
    ReconciliationModule,

    // Dashboard views, targets and export
    ReportModule,
  ],
  controllers: [],
  providers: [
    // Global rate limiting guard
    {
      provide: APP_GUARD,
      useClass: ThrottlerGuard,
    },
  ],
})
export class AppModule {}
