import { Module } from '@nestjs/common';
import { DatabaseModule } from '../../database/database.module';
import { GazetteerModule } from '../gazetteer/gazetteer.module';
import { RecordNormalizerService } from './record-normalizer.service';
import { SourceService } from './source.service';

@Module({
  imports: [DatabaseModule, GazetteerModule],
  providers: [RecordNormalizerService, SourceService],
  exports: [RecordNormalizerService, SourceService],
})
export class IngestModule {}
