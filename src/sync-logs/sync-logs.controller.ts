import { Controller, Get, NotFoundException, Param, Query } from '@nestjs/common';
import { SyncLogQueryDto } from './dto/sync-log-query.dto';
import { SyncLogStore } from './sync-log.store';

@Controller('odoo/sync-logs')
export class SyncLogsController {
  constructor(private readonly syncLogs: SyncLogStore) {}

  @Get()
  async findAll(@Query() query: SyncLogQueryDto) {
    return this.syncLogs.findAll({
      integrationId: query.integration,
      entity: query.entity,
      direction: query.direction,
      status: query.status,
      from: query.from ? new Date(query.from) : undefined,
      to: query.to ? new Date(query.to) : undefined,
    });
  }

  @Get(':id')
  async findById(@Param('id') id: string) {
    const log = await this.syncLogs.findById(id);
    if (!log) {
      throw new NotFoundException(`Sync log ${id} not found`);
    }
    return log;
  }
}
