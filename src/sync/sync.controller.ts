import {
  Body,
  Controller,
  Delete,
  Get,
  HttpException,
  HttpStatus,
  Logger,
  Param,
  Patch,
  Post,
} from '@nestjs/common';
import { toHttpException } from '../common/http/http-errors';
import { CreateIntegrationDto } from '../integrations/dto/create-integration.dto';
import { UpdateIntegrationDto } from '../integrations/dto/update-integration.dto';
import { IntegrationStore } from '../integrations/integration.store';
import {
  IntegrationConfig,
  isSyncEntity,
} from '../integrations/integration.types';
import { SyncRequestDto } from './dto/sync-request.dto';
import { DEFAULT_DIRECTION } from './sync.constants';
import { SyncScheduler } from './sync.scheduler';
import { OdooSyncService } from './sync.service';

/** Integration as returned over HTTP; the API key never leaves the service. */
type IntegrationView = Omit<IntegrationConfig, 'connection'> & {
  connection: Omit<IntegrationConfig['connection'], 'apiKey'>;
};

function toView(integration: IntegrationConfig): IntegrationView {
  const { url, database, username, companyId, version } = integration.connection;
  return {
    ...integration,
    connection: { url, database, username, companyId, version },
  };
}

@Controller('odoo')
export class SyncController {
  private readonly logger = new Logger(SyncController.name);

  constructor(
    private readonly integrations: IntegrationStore,
    private readonly syncService: OdooSyncService,
    private readonly scheduler: SyncScheduler,
  ) {}

  @Get('integrations')
  async findIntegrations() {
    const integrations = await this.integrations.findAll();
    return {
      success: true,
      data: integrations.map(toView),
    };
  }

  @Post('integrations')
  async createIntegration(@Body() dto: CreateIntegrationDto) {
    try {
      const integration = await this.integrations.create(dto);
      await this.scheduler.schedule(integration);
      return {
        success: true,
        data: toView(integration),
      };
    } catch (error) {
      throw toHttpException(error, 'Failed to create integration');
    }
  }

  @Get('integrations/:id')
  async findIntegration(@Param('id') id: string) {
    try {
      return {
        success: true,
        data: toView(await this.integrations.findById(id)),
      };
    } catch (error) {
      throw toHttpException(error, 'Failed to get integration');
    }
  }

  @Patch('integrations/:id')
  async updateIntegration(@Param('id') id: string, @Body() dto: UpdateIntegrationDto) {
    try {
      const integration = await this.integrations.update(id, dto);
      await this.scheduler.schedule(integration);
      return {
        success: true,
        data: toView(integration),
      };
    } catch (error) {
      throw toHttpException(error, 'Failed to update integration');
    }
  }

  @Delete('integrations/:id')
  async removeIntegration(@Param('id') id: string) {
    try {
      await this.integrations.remove(id);
      await this.scheduler.unschedule(id);
      return {
        success: true,
        message: `Integration ${id} removed`,
      };
    } catch (error) {
      throw toHttpException(error, 'Failed to remove integration');
    }
  }

  @Post('integrations/:id/test-connection')
  async testConnection(@Param('id') id: string) {
    try {
      const report = await this.syncService.testConnection(id);
      return {
        success: report.connected,
        data: report,
      };
    } catch (error) {
      throw toHttpException(error, 'Failed to test connection');
    }
  }

  @Post('integrations/:id/sync/:entity')
  async syncEntity(
    @Param('id') id: string,
    @Param('entity') entity: string,
    @Body() body: SyncRequestDto,
  ) {
    if (!isSyncEntity(entity)) {
      throw new HttpException(`Unknown sync entity ${entity}`, HttpStatus.BAD_REQUEST);
    }
    const direction = body.direction ?? DEFAULT_DIRECTION;

    try {
      const log = await this.syncService.syncEntity(id, entity, direction);
      this.logger.log(`Manual ${entity} ${direction} for ${id} ended ${log.status}`);
      return {
        success: log.status !== 'error',
        message: `${entity} sync ${direction} ${log.status === 'error' ? 'failed' : 'completed'}`,
        data: log,
      };
    } catch (error) {
      throw toHttpException(error, `Failed to sync ${entity}`);
    }
  }

  @Post('integrations/:id/sync-all')
  async syncAll(@Param('id') id: string, @Body() body: SyncRequestDto) {
    const direction = body.direction ?? DEFAULT_DIRECTION;

    try {
      const logs = await this.syncService.syncAll(id, direction);
      return {
        success: logs.every((log) => log.status !== 'error'),
        data: logs,
      };
    } catch (error) {
      throw toHttpException(error, 'Failed to sync integration');
    }
  }
}
