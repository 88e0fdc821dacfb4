import { Module } from '@nestjs/common';
import { MongooseModule } from '@nestjs/mongoose';
import { SyncLog, SyncLogSchema } from './schemas/sync-log.schema';
import { SyncLogStore } from './sync-log.store';
import { SyncLogsController } from './sync-logs.controller';
import { SyncLogsService } from './sync-logs.service';

@Module({
  imports: [
    MongooseModule.forFeature([{ name: SyncLog.name, schema: SyncLogSchema }]),
  ],
  controllers: [SyncLogsController],
  providers: [{ provide: SyncLogStore, useClass: SyncLogsService }],
  exports: [SyncLogStore],
})
export class SyncLogsModule {}
