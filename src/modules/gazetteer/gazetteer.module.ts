import { Module } from '@nestjs/common';
import { GazetteerService } from './gazetteer.service';
import { GAZETTEER_TABLES, loadDefaultGazetteerTables } from './gazetteer.tables';

/**
 * GazetteerModule - party and city classification
 *
 * Tables are parsed once at startup; a malformed table stops the boot.
 */
@Module({
  providers: [
    {
      provide: GAZETTEER_TABLES,
      useFactory: loadDefaultGazetteerTables,
    },
    GazetteerService,
  ],
  exports: [GazetteerService, GAZETTEER_TABLES],
})
export class GazetteerModule {}
