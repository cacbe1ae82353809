import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { DatabaseService } from './database.service';
import { readInt } from '../config/dashboard.config';

@Module({
  imports: [
    ConfigModule,
    TypeOrmModule.forRootAsync({
      imports: [ConfigModule],
      useFactory: (configService: ConfigService) => ({
        type: 'postgres',
        host: configService.get<string>('DB_HOST', 'localhost'),
        port: readInt(configService.get<string>('DB_PORT'), 5432),
        username: configService.get<string>('DB_USERNAME', 'postgres'),
        password: configService.get<string>('DB_PASSWORD', 'postgres'),
        database: configService.get<string>('DB_DATABASE', 'trip_ledger'),

        // Entity auto-loading (party_target, pending_cn_exclusion)
        autoLoadEntities: true,

        // Source tables are owned upstream; never let TypeORM touch them
        synchronize: false,

        logging: configService.get<string>('NODE_ENV') === 'development'
          ? ['query', 'error', 'warn']
          : ['error', 'warn'],
        logger: 'advanced-console',

        retryAttempts: 3,
        retryDelay: 3000,

        applicationName: 'TripLedger-API',

        // Bounded connection timeout; a dead store surfaces as SOURCE_UNAVAILABLE
        connectTimeoutMS: readInt(configService.get<string>('DB_CONNECT_TIMEOUT_MS'), 10000),
        extra: {
          max: readInt(configService.get<string>('DB_MAX_CONNECTIONS'), 10),
          statement_timeout: 30000,
        },
      }),
      inject: [ConfigService],
    }),
  ],
  providers: [DatabaseService],
  exports: [DatabaseService, TypeOrmModule],
})
export class DatabaseModule {}
