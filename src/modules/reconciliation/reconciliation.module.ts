import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { PendingCnExclusion } from './entities/pending-cn-exclusion.entity';
import { ExclusionService } from './exclusion.service';
import { ExclusionController } from './exclusion.controller';
import { ReconciliationService } from './reconciliation.service';
import { PENDING_CN_MATCHERS, defaultPendingMatchers } from './pending-cn.matchers';

@Module({
  imports: [TypeOrmModule.forFeature([PendingCnExclusion])],
  controllers: [ExclusionController],
  providers: [
    ExclusionService,
    ReconciliationService,
    {
      provide: PENDING_CN_MATCHERS,
      useFactory: defaultPendingMatchers,
    },
  ],
  exports: [ExclusionService, ReconciliationService],
})
export class ReconciliationModule {}
