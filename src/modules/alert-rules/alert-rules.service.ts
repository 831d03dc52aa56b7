import { Injectable, Logger } from '@nestjs/common';
import { EventEmitter2 } from '@nestjs/event-emitter';
import { AlertRule } from '../../database/entities/alert-rule.entity';
import {
  AlertRuleRow,
  AlertRuleStore,
  RulePage,
  RuleSearchCriteria,
} from '../../database/services/alert-rule-store.service';
import {
  ALERT_RULE_CHANGED_EVENT,
  DataType,
  MAX_PAGE_SIZE,
  RULE_TUPLE_COLUMNS,
} from '../../common/constants/alert-rule.constants';
import { ConstraintViolationException } from '../../common/exceptions/constraint-violation.exception';
import { DuplicateRuleException } from '../../common/exceptions/duplicate-rule.exception';
import {
  AlertRuleChangeAction,
  AlertRuleChangedEvent,
} from '../../common/interfaces/alert-rule-events.interface';
import { validateRuleInput } from './alert-rule.validator';

export type RuleSearchQuery = Partial<RuleSearchCriteria>;

export interface RuleStatistics {
  total: number;
  enabled: number;
  disabled: number;
}

function isTupleViolation(error: unknown): error is ConstraintViolationException {
  return (
    error instanceof ConstraintViolationException &&
    error.kind === 'unique' &&
    RULE_TUPLE_COLUMNS.every((column) => error.columns.includes(column))
  );
}

@Injectable()
export class AlertRulesService {
  private readonly logger = new Logger(AlertRulesService.name);

  constructor(
    private readonly store: AlertRuleStore,
    private readonly eventEmitter: EventEmitter2,
  ) {}

  /**
   * Validates and persists a new rule. `input` is checked field by field, so
   * it may come from any caller.
   */
  async create(input: unknown): Promise<AlertRule> {
    const row = validateRuleInput(input);
    const now = new Date();
    const id = await this.persist(row, () => this.store.insert(row, now));
    // returned as written: a concurrent delete must not surface here as NotFound
    const rule = Object.assign(new AlertRule(), { ...row, id, created_at: now, updated_at: now });

    this.logger.log(`Created alert rule ${id} "${rule.rule_name}" on channel ${rule.channel_id}`);
    this.emitChange('created', rule);
    return rule;
  }

  /** Full replace: omitted optional fields fall back to their defaults. */
  async update(id: number, input: unknown): Promise<AlertRule> {
    const row = validateRuleInput(input);
    await this.persist(row, () => this.store.update(id, row));
    const rule = await this.store.get(id);

    this.logger.log(`Updated alert rule ${id}`);
    this.emitChange('updated', rule);
    return rule;
  }

  async enable(id: number): Promise<AlertRule> {
    return this.toggle(id, true);
  }

  async disable(id: number): Promise<AlertRule> {
    return this.toggle(id, false);
  }

  async delete(id: number): Promise<void> {
    const rule = await this.store.get(id);
    await this.store.delete(id);

    this.logger.log(`Deleted alert rule ${id}`);
    this.emitChange('deleted', rule);
  }

  async get(id: number): Promise<AlertRule> {
    return this.store.get(id);
  }

  async listAll(): Promise<AlertRule[]> {
    return this.store.list();
  }

  async listByChannel(channelId: number): Promise<AlertRule[]> {
    return this.store.list({ channel_id: channelId });
  }

  async listEnabledForPoint(channelId: number, dataType: DataType, pointId: number): Promise<AlertRule[]> {
    return this.store.listEnabledForPoint(channelId, dataType, pointId);
  }

  async search(query: RuleSearchQuery = {}): Promise<RulePage> {
    const page = Math.max(1, Math.floor(query.page ?? 1));
    const pageSize = Math.min(MAX_PAGE_SIZE, Math.max(1, Math.floor(query.page_size ?? 10)));
    const keyword = query.keyword?.trim();

    return this.store.search({
      ...query,
      keyword: keyword || undefined,
      page,
      page_size: pageSize,
    });
  }

  async getStatistics(): Promise<RuleStatistics> {
    const [total, enabled] = await Promise.all([this.store.count(), this.store.countEnabled()]);
    return { total, enabled, disabled: total - enabled };
  }

  private async toggle(id: number, enabled: boolean): Promise<AlertRule> {
    await this.store.setEnabled(id, enabled);
    const rule = await this.store.get(id);

    this.logger.log(`${enabled ? 'Enabled' : 'Disabled'} alert rule ${id}`);
    this.emitChange(enabled ? 'enabled' : 'disabled', rule);
    return rule;
  }

  private async persist<T>(row: AlertRuleRow, write: () => Promise<T>): Promise<T> {
    try {
      return await write();
    } catch (error) {
      if (isTupleViolation(error)) {
        throw new DuplicateRuleException({
          channel_id: row.channel_id,
          data_type: row.data_type,
          point_id: row.point_id,
          rule_name: row.rule_name,
        });
      }
      throw error;
    }
  }

  private emitChange(action: AlertRuleChangeAction, rule: AlertRule) {
    const event: AlertRuleChangedEvent = {
      action,
      ruleId: rule.id,
      channelId: rule.channel_id,
      ruleName: rule.rule_name,
      timestamp: new Date(),
    };
    this.eventEmitter.emit(ALERT_RULE_CHANGED_EVENT, event);
  }
}
