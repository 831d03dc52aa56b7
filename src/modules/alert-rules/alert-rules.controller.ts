import {
  Body,
  Controller,
  Delete,
  Get,
  HttpCode,
  HttpStatus,
  Param,
  ParseIntPipe,
  Post,
  Put,
  Query,
} from '@nestjs/common';
import { ApiOperation, ApiResponse, ApiTags } from '@nestjs/swagger';
import { AlertRulesService } from './alert-rules.service';
import {
  AlertRuleInputDto,
  ListAlertRulesQueryDto,
  SearchAlertRulesQueryDto,
} from '../../common/dto/alert-rule.dto';
import { DATA_TYPES, DataType } from '../../common/constants/alert-rule.constants';
import { RuleValidationException } from '../../common/exceptions/rule-validation.exception';

function parseDataType(value: string): DataType {
  const match = DATA_TYPES.find((dataType) => dataType === value);
  if (!match) {
    throw new RuleValidationException('data_type', `must be one of ${DATA_TYPES.join(', ')}`);
  }
  return match;
}

@ApiTags('Alert Rules')
@Controller('rules')
export class AlertRulesController {
  constructor(private readonly alertRulesService: AlertRulesService) {}

  @Post()
  @ApiOperation({ summary: 'Create an alert rule' })
  @ApiResponse({ status: 201, description: 'Rule created' })
  @ApiResponse({ status: 409, description: 'A rule with the same channel, data type, point and name exists' })
  async create(@Body() input: AlertRuleInputDto) {
    const rule = await this.alertRulesService.create(input);
    return {
      success: true,
      message: 'Alert rule created successfully',
      data: rule,
    };
  }

  @Get()
  @ApiOperation({ summary: 'List alert rules, optionally for one channel' })
  async list(@Query() query: ListAlertRulesQueryDto) {
    const rules =
      query.channel_id === undefined
        ? await this.alertRulesService.listAll()
        : await this.alertRulesService.listByChannel(query.channel_id);
    return {
      success: true,
      message: `Found ${rules.length} rules`,
      data: { total: rules.length, list: rules },
    };
  }

  @Get('search')
  @ApiOperation({ summary: 'Search alert rules with paging' })
  async search(@Query() query: SearchAlertRulesQueryDto) {
    const page = await this.alertRulesService.search(query);
    return {
      success: true,
      message: `Found ${page.total} rules`,
      data: page,
    };
  }

  @Get('statistics')
  @ApiOperation({ summary: 'Total, enabled and disabled rule counts' })
  async statistics() {
    return {
      success: true,
      message: 'Rule statistics',
      data: await this.alertRulesService.getStatistics(),
    };
  }

  @Get('point/:channelId/:dataType/:pointId')
  @ApiOperation({ summary: 'Enabled rules watching one point, most severe first' })
  async listForPoint(
    @Param('channelId', ParseIntPipe) channelId: number,
    @Param('dataType') dataType: string,
    @Param('pointId', ParseIntPipe) pointId: number,
  ) {
    const rules = await this.alertRulesService.listEnabledForPoint(channelId, parseDataType(dataType), pointId);
    return {
      success: true,
      message: `Found ${rules.length} rules`,
      data: { total: rules.length, list: rules },
    };
  }

  @Get(':id')
  @ApiOperation({ summary: 'Get an alert rule' })
  @ApiResponse({ status: 404, description: 'Rule not found' })
  async get(@Param('id', ParseIntPipe) id: number) {
    return {
      success: true,
      message: 'Alert rule found',
      data: await this.alertRulesService.get(id),
    };
  }

  @Put(':id')
  @ApiOperation({ summary: 'Replace an alert rule' })
  async update(@Param('id', ParseIntPipe) id: number, @Body() input: AlertRuleInputDto) {
    return {
      success: true,
      message: 'Alert rule updated successfully',
      data: await this.alertRulesService.update(id, input),
    };
  }

  @Delete(':id')
  @ApiOperation({ summary: 'Delete an alert rule' })
  async delete(@Param('id', ParseIntPipe) id: number) {
    await this.alertRulesService.delete(id);
    return {
      success: true,
      message: 'Alert rule deleted successfully',
    };
  }

  @Post(':id/enable')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Enable an alert rule' })
  async enable(@Param('id', ParseIntPipe) id: number) {
    return {
      success: true,
      message: 'Alert rule enabled',
      data: await this.alertRulesService.enable(id),
    };
  }

  @Post(':id/disable')
  @HttpCode(HttpStatus.OK)
  @ApiOperation({ summary: 'Disable an alert rule' })
  async disable(@Param('id', ParseIntPipe) id: number) {
    return {
      success: true,
      message: 'Alert rule disabled',
      data: await this.alertRulesService.disable(id),
    };
  }
}
