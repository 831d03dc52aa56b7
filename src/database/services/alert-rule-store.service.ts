import { Injectable, Logger, OnModuleInit } from '@nestjs/common';
import { InjectRepository } from '@nestjs/typeorm';
import { Repository, SelectQueryBuilder } from 'typeorm';
import { AlertRule } from '../entities/alert-rule.entity';
import {
  ComparisonOperator,
  DataType,
  WarningLevel,
} from '../../common/constants/alert-rule.constants';
import { RuleNotFoundException } from '../../common/exceptions/rule-not-found.exception';
import { StorageUnavailableException } from '../../common/exceptions/storage-unavailable.exception';
import { translateStorageError } from '../storage-errors';

/** The mutable part of a rule, as written by insert and update. */
export interface AlertRuleRow {
  channel_id: number;
  data_type: DataType;
  point_id: number;
  rule_name: string;
  warning_level: WarningLevel;
  operator: ComparisonOperator;
  value: number;
  enabled: boolean;
  description: string;
}

export interface RuleListFilter {
  channel_id?: number;
}

export interface RuleSearchCriteria {
  keyword?: string;
  channel_id?: number;
  data_type?: DataType;
  warning_level?: WarningLevel;
  enabled?: boolean;
  start_time?: Date;
  end_time?: Date;
  page: number;
  page_size: number;
}

export interface RulePage {
  total: number;
  list: AlertRule[];
}

export type CheckpointMode = 'PASSIVE' | 'FULL' | 'RESTART' | 'TRUNCATE';

export interface CheckpointResult {
  busy: number;
  log: number;
  checkpointed: number;
}

// Keeps updated_at strictly increasing even for mutations within the same millisecond.
const REFRESH_UPDATED_AT = () => 'MAX(:now, updated_at + 1)';

function escapeLike(value: string): string {
  return value.replace(/[\\%_]/g, (match) => `\\${match}`);
}

@Injectable()
export class AlertRuleStore implements OnModuleInit {
  private readonly logger = new Logger(AlertRuleStore.name);

  constructor(
    @InjectRepository(AlertRule)
    private readonly repository: Repository<AlertRule>,
  ) {}

  async onModuleInit() {
    await this.initialize();
  }

  /**
   * Verifies the opened database is usable: the schema migrations have run
   * when the data source opened, so what is left is the journal mode.
   */
  async initialize(): Promise<void> {
    const journalMode = await this.getJournalMode();
    if (journalMode !== 'wal') {
      throw new StorageUnavailableException(
        'SQLITE_WAL_DISABLED',
        `journal mode is "${journalMode}", expected "wal"`,
      );
    }
    const total = await this.count();
    this.logger.log(`Rule store ready (journal_mode=${journalMode}, ${total} rules)`);
  }

  async insert(row: AlertRuleRow, now: Date = new Date()): Promise<number> {
    const result = await this.run('insert', () =>
      this.repository.insert({ ...row, created_at: now, updated_at: now }),
    );

    const [identifier] = result.identifiers;
    const id: unknown = identifier?.id;
    if (typeof id !== 'number') {
      throw new Error('Insert did not report a generated rule id');
    }
    return id;
  }

  async update(id: number, row: AlertRuleRow, now: Date = new Date()): Promise<void> {
    const result = await this.run('update', () =>
      this.repository
        .createQueryBuilder()
        .update(AlertRule)
        .set({ ...row, updated_at: REFRESH_UPDATED_AT })
        .where('id = :id', { id })
        .setParameter('now', now.getTime())
        .execute(),
    );

    if (!result.affected) {
      throw this.notFound('update', id);
    }
  }

  async setEnabled(id: number, enabled: boolean, now: Date = new Date()): Promise<void> {
    const result = await this.run('setEnabled', () =>
      this.repository
        .createQueryBuilder()
        .update(AlertRule)
        .set({ enabled, updated_at: REFRESH_UPDATED_AT })
        .where('id = :id', { id })
        .setParameter('now', now.getTime())
        .execute(),
    );

    if (!result.affected) {
      throw this.notFound('setEnabled', id);
    }
  }

  async delete(id: number): Promise<void> {
    const result = await this.run('delete', () => this.repository.delete({ id }));

    if (!result.affected) {
      throw this.notFound('delete', id);
    }
  }

  async get(id: number): Promise<AlertRule> {
    const rule = await this.run('get', () => this.repository.findOneBy({ id }));
    if (!rule) {
      throw this.notFound('get', id);
    }
    return rule;
  }

  async list(filter: RuleListFilter = {}): Promise<AlertRule[]> {
    return this.run('list', () =>
      this.repository.find({
        where: filter.channel_id === undefined ? {} : { channel_id: filter.channel_id },
        order: { id: 'ASC' },
      }),
    );
  }

  async listEnabledForPoint(channelId: number, dataType: DataType, pointId: number): Promise<AlertRule[]> {
    return this.run('listEnabledForPoint', () =>
      this.repository
        .createQueryBuilder('rule')
        .where('rule.channel_id = :channelId', { channelId })
        .andWhere('rule.data_type = :dataType', { dataType })
        .andWhere('rule.point_id = :pointId', { pointId })
        .andWhere('rule.enabled = 1')
        .orderBy('rule.warning_level', 'DESC')
        .addOrderBy('rule.id', 'ASC')
        .getMany(),
    );
  }

  async search(criteria: RuleSearchCriteria): Promise<RulePage> {
    const query = this.applySearchCriteria(this.repository.createQueryBuilder('rule'), criteria)
      .orderBy('rule.id', 'ASC')
      .offset((criteria.page - 1) * criteria.page_size)
      .limit(criteria.page_size);

    const [list, total] = await this.run('search', () => query.getManyAndCount());
    return { total, list };
  }

  async count(): Promise<number> {
    return this.run('count', () => this.repository.count());
  }

  async countEnabled(): Promise<number> {
    return this.run('countEnabled', () =>
      this.repository.createQueryBuilder('rule').where('rule.enabled = 1').getCount(),
    );
  }

  async getJournalMode(): Promise<string> {
    const rows: Array<{ journal_mode: string }> = await this.run('getJournalMode', () =>
      this.repository.query('PRAGMA journal_mode'),
    );
    return rows[0]?.journal_mode ?? 'unknown';
  }

  async checkpoint(mode: CheckpointMode): Promise<CheckpointResult> {
    const rows: CheckpointResult[] = await this.run('checkpoint', () =>
      this.repository.query(`PRAGMA wal_checkpoint(${mode})`),
    );
    return rows[0] ?? { busy: 0, log: 0, checkpointed: 0 };
  }

  private applySearchCriteria(
    query: SelectQueryBuilder<AlertRule>,
    criteria: RuleSearchCriteria,
  ): SelectQueryBuilder<AlertRule> {
    if (criteria.keyword) {
      query.andWhere(
        `(rule.rule_name LIKE :keyword ESCAPE '\\' OR rule.description LIKE :keyword ESCAPE '\\' ` +
          `OR CAST(rule.channel_id AS TEXT) LIKE :keyword ESCAPE '\\' OR CAST(rule.point_id AS TEXT) LIKE :keyword ESCAPE '\\')`,
        { keyword: `%${escapeLike(criteria.keyword)}%` },
      );
    }
    if (criteria.channel_id !== undefined) {
      query.andWhere('rule.channel_id = :channelId', { channelId: criteria.channel_id });
    }
    if (criteria.data_type !== undefined) {
      query.andWhere('rule.data_type = :dataType', { dataType: criteria.data_type });
    }
    if (criteria.warning_level !== undefined) {
      query.andWhere('rule.warning_level = :warningLevel', { warningLevel: criteria.warning_level });
    }
    if (criteria.enabled !== undefined) {
      query.andWhere('rule.enabled = :enabled', { enabled: criteria.enabled ? 1 : 0 });
    }
    if (criteria.start_time) {
      query.andWhere('rule.created_at >= :startTime', { startTime: criteria.start_time.getTime() });
    }
    if (criteria.end_time) {
      query.andWhere('rule.created_at <= :endTime', { endTime: criteria.end_time.getTime() });
    }
    return query;
  }

  private notFound(operation: string, id: number): RuleNotFoundException {
    this.logger.warn(`Rule store ${operation}: no rule with id ${id}`);
    return new RuleNotFoundException(id);
  }

  private async run<T>(operation: string, work: () => Promise<T>): Promise<T> {
    try {
      return await work();
    } catch (error) {
      const translated = translateStorageError(error);
      if (translated instanceof StorageUnavailableException) {
        this.logger.error(`Rule store ${operation} failed: ${translated.message}`);
      }
      throw translated;
    }
  }
}
