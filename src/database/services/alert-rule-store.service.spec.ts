import { existsSync, mkdtempSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { DataSource } from 'typeorm';
import { AlertRuleRow, AlertRuleStore } from './alert-rule-store.service';
import { AlertRule } from '../entities/alert-rule.entity';
import { buildDataSourceOptions } from '../data-source';
import { ConstraintViolationException } from '../../common/exceptions/constraint-violation.exception';
import { RuleNotFoundException } from '../../common/exceptions/rule-not-found.exception';

const T0 = new Date('2024-06-01T08:00:00.000Z');

function row(overrides: Partial<AlertRuleRow> = {}): AlertRuleRow {
  return {
    channel_id: 1001,
    data_type: 'T',
    point_id: 1,
    rule_name: 'temp-high',
    warning_level: 2,
    operator: '>',
    value: 85,
    enabled: true,
    description: '',
    ...overrides,
  };
}

async function openStore(path: string): Promise<{ dataSource: DataSource; store: AlertRuleStore }> {
  const dataSource = new DataSource(buildDataSourceOptions({ path, busyTimeoutMs: 1000, logging: false }));
  await dataSource.initialize();
  const store = new AlertRuleStore(dataSource.getRepository(AlertRule));
  await store.initialize();
  return { dataSource, store };
}

describe('AlertRuleStore', () => {
  let workDir: string;
  let databasePath: string;
  let dataSource: DataSource;
  let store: AlertRuleStore;

  beforeEach(async () => {
    workDir = mkdtempSync(join(tmpdir(), 'alert-rule-store-'));
    databasePath = join(workDir, 'nested', 'config', 'rules.db');
    ({ dataSource, store } = await openStore(databasePath));
  });

  afterEach(async () => {
    if (dataSource.isInitialized) {
      await dataSource.destroy();
    }
    rmSync(workDir, { recursive: true, force: true });
  });

  describe('initialize', () => {
    it('creates the parent directories and opens the file in WAL mode', async () => {
      expect(existsSync(databasePath)).toBe(true);
      expect(await store.getJournalMode()).toBe('wal');
    });

    it('is idempotent across restarts and keeps existing rows', async () => {
      const id = await store.insert(row(), T0);
      await dataSource.destroy();

      ({ dataSource, store } = await openStore(databasePath));

      const rules = await store.list();
      expect(rules.map((rule) => rule.id)).toEqual([id]);
      expect(await store.insert(row({ point_id: 2 }), T0)).toBe(id + 1);
    });
  });

  describe('insert', () => {
    it('assigns increasing ids and timestamps', async () => {
      const first = await store.insert(row(), T0);
      const second = await store.insert(row({ rule_name: 'temp-very-high', warning_level: 3, value: 95 }), T0);

      expect(first).toBe(1);
      expect(second).toBe(2);

      const rule = await store.get(first);
      expect(rule).toMatchObject({
        id: 1,
        channel_id: 1001,
        data_type: 'T',
        point_id: 1,
        rule_name: 'temp-high',
        warning_level: 2,
        operator: '>',
        value: 85,
        enabled: true,
        description: '',
      });
      expect(rule.created_at.getTime()).toBe(T0.getTime());
      expect(rule.updated_at.getTime()).toBe(T0.getTime());
    });

    it('never reuses the id of a deleted rule', async () => {
      await store.insert(row(), T0);
      const second = await store.insert(row({ point_id: 2 }), T0);
      await store.delete(second);

      expect(await store.insert(row({ point_id: 3 }), T0)).toBe(3);
    });

    it('rejects a duplicate rule tuple as a unique violation', async () => {
      await store.insert(row(), T0);

      const failure = await store.insert(row({ value: 90, warning_level: 3 }), T0).catch((error: unknown) => error);

      expect(failure).toBeInstanceOf(ConstraintViolationException);
      expect((failure as ConstraintViolationException).kind).toBe('unique');
      expect((failure as ConstraintViolationException).columns).toEqual([
        'channel_id',
        'data_type',
        'point_id',
        'rule_name',
      ]);
      expect(await store.count()).toBe(1);
    });

    it('stores names and descriptions exactly as given', async () => {
      const description = 'd'.repeat(5000);
      const id = await store.insert(row({ rule_name: ' temp-high ', description }), T0);

      const rule = await store.get(id);
      expect(rule.rule_name).toBe(' temp-high ');
      expect(rule.description).toBe(description);
    });

    it('allows the same rule name on another point', async () => {
      await store.insert(row(), T0);
      await expect(store.insert(row({ point_id: 2 }), T0)).resolves.toBe(2);
      await expect(store.insert(row({ data_type: 'S' }), T0)).resolves.toBe(3);
    });

    it.each([
      ['data_type', { data_type: 'X' }],
      ['warning_level', { warning_level: 4 }],
      ['operator', { operator: '=~' }],
      ['rule_name', { rule_name: '   ' }],
    ])('enforces the %s check constraint at the storage layer', async (_field, invalid) => {
      const badRow = { ...row(), ...invalid } as unknown as AlertRuleRow;

      const failure = await store.insert(badRow, T0).catch((error: unknown) => error);

      expect(failure).toBeInstanceOf(ConstraintViolationException);
      expect((failure as ConstraintViolationException).kind).toBe('check');
      expect(await store.count()).toBe(0);
    });
  });

  describe('update', () => {
    it('replaces the mutable fields and refreshes updated_at', async () => {
      const id = await store.insert(row(), T0);
      const later = new Date(T0.getTime() + 60_000);

      await store.update(
        id,
        row({ rule_name: 'temp-critical', warning_level: 3, operator: '>=', value: 100, description: 'boiler' }),
        later,
      );

      const rule = await store.get(id);
      expect(rule).toMatchObject({
        id,
        rule_name: 'temp-critical',
        warning_level: 3,
        operator: '>=',
        value: 100,
        description: 'boiler',
      });
      expect(rule.created_at.getTime()).toBe(T0.getTime());
      expect(rule.updated_at.getTime()).toBe(later.getTime());
    });

    it('throws RuleNotFoundException for an unknown id', async () => {
      await expect(store.update(42, row(), T0)).rejects.toBeInstanceOf(RuleNotFoundException);
    });

    it('rejects an update that collides with another rule tuple', async () => {
      await store.insert(row(), T0);
      const id = await store.insert(row({ rule_name: 'temp-low', operator: '<', value: 5 }), T0);

      const failure = await store.update(id, row(), T0).catch((error: unknown) => error);

      expect(failure).toBeInstanceOf(ConstraintViolationException);
      expect((failure as ConstraintViolationException).kind).toBe('unique');
      expect((await store.get(id)).rule_name).toBe('temp-low');
    });
  });

  describe('setEnabled', () => {
    it('flips the flag without touching other fields', async () => {
      const id = await store.insert(row({ description: 'inlet' }), T0);

      await store.setEnabled(id, false, new Date(T0.getTime() + 1000));

      const rule = await store.get(id);
      expect(rule.enabled).toBe(false);
      expect(rule.description).toBe('inlet');
      expect(rule.value).toBe(85);
      expect(rule.updated_at.getTime()).toBe(T0.getTime() + 1000);
    });

    it('strictly increases updated_at even within the same millisecond', async () => {
      const id = await store.insert(row(), T0);

      await store.setEnabled(id, false, T0);
      const first = await store.get(id);
      await store.setEnabled(id, false, T0);
      const second = await store.get(id);

      expect(first.enabled).toBe(false);
      expect(second.enabled).toBe(false);
      expect(first.updated_at.getTime()).toBe(T0.getTime() + 1);
      expect(second.updated_at.getTime()).toBe(T0.getTime() + 2);
    });

    it('throws RuleNotFoundException for an unknown id', async () => {
      await expect(store.setEnabled(7, true, T0)).rejects.toBeInstanceOf(RuleNotFoundException);
    });
  });

  describe('delete', () => {
    it('removes the row permanently', async () => {
      const id = await store.insert(row(), T0);

      await store.delete(id);

      await expect(store.get(id)).rejects.toBeInstanceOf(RuleNotFoundException);
      await expect(store.delete(id)).rejects.toBeInstanceOf(RuleNotFoundException);
    });
  });

  describe('reads', () => {
    beforeEach(async () => {
      await store.insert(row({ channel_id: 2002, rule_name: 'pressure-low', operator: '<', value: 1.5 }), T0);
      await store.insert(row({ warning_level: 1, rule_name: 'temp-warm', value: 60, description: 'pump 100% load' }), T0);
      await store.insert(row({ warning_level: 3, rule_name: 'temp-hot', value: 95 }), new Date(T0.getTime() + 5000));
      const disabled = await store.insert(row({ rule_name: 'temp-off', value: 70 }), T0);
      await store.setEnabled(disabled, false, T0);
    });

    it('lists rules by id, optionally for one channel', async () => {
      expect((await store.list()).map((rule) => rule.id)).toEqual([1, 2, 3, 4]);
      expect((await store.list({ channel_id: 1001 })).map((rule) => rule.id)).toEqual([2, 3, 4]);
      expect(await store.list({ channel_id: 9999 })).toEqual([]);
    });

    it('materializes a fresh list per call', async () => {
      const first = await store.list();
      first.pop();
      expect(await store.list()).toHaveLength(4);
    });

    it('lists enabled rules for a point, most severe first', async () => {
      const rules = await store.listEnabledForPoint(1001, 'T', 1);
      expect(rules.map((rule) => rule.rule_name)).toEqual(['temp-hot', 'temp-warm']);
    });

    it('counts all and enabled rules', async () => {
      expect(await store.count()).toBe(4);
      expect(await store.countEnabled()).toBe(3);
    });

    it('searches by keyword with paging', async () => {
      const page = await store.search({ keyword: 'temp', page: 1, page_size: 2 });
      expect(page.total).toBe(3);
      expect(page.list.map((rule) => rule.id)).toEqual([2, 3]);

      const next = await store.search({ keyword: 'temp', page: 2, page_size: 2 });
      expect(next.list.map((rule) => rule.id)).toEqual([4]);
    });

    it('matches the keyword against channel ids and descriptions', async () => {
      expect((await store.search({ keyword: '2002', page: 1, page_size: 10 })).list.map((rule) => rule.id)).toEqual([1]);
      expect((await store.search({ keyword: '100%', page: 1, page_size: 10 })).list.map((rule) => rule.id)).toEqual([2]);
    });

    it('treats LIKE wildcards in the keyword literally', async () => {
      const page = await store.search({ keyword: 'temp_', page: 1, page_size: 10 });
      expect(page.total).toBe(0);
    });

    it('filters by level, enabled state and creation time', async () => {
      expect((await store.search({ warning_level: 3, page: 1, page_size: 10 })).list.map((rule) => rule.id)).toEqual([3]);
      expect((await store.search({ enabled: false, page: 1, page_size: 10 })).list.map((rule) => rule.id)).toEqual([4]);
      expect(
        (await store.search({ start_time: new Date(T0.getTime() + 1), page: 1, page_size: 10 })).list.map(
          (rule) => rule.id,
        ),
      ).toEqual([3]);
      expect(
        (await store.search({ data_type: 'T', channel_id: 2002, end_time: T0, page: 1, page_size: 10 })).total,
      ).toBe(1);
    });
  });

  describe('concurrent access', () => {
    it('lets a second connection read committed rules and rejects the losing writer of a tuple', async () => {
      const other = await openStore(databasePath);
      try {
        await store.insert(row(), T0);
        expect((await other.store.list()).map((rule) => rule.rule_name)).toEqual(['temp-high']);

        const results = await Promise.allSettled([
          store.insert(row({ point_id: 5 }), T0),
          other.store.insert(row({ point_id: 5 }), T0),
        ]);

        expect(results.filter((result) => result.status === 'fulfilled')).toHaveLength(1);
        const rejected = results.find((result): result is PromiseRejectedResult => result.status === 'rejected');
        expect(rejected?.reason).toBeInstanceOf(ConstraintViolationException);
      } finally {
        await other.dataSource.destroy();
      }
    });
  });

  it('checkpoints the WAL', async () => {
    await store.insert(row(), T0);
    const result = await store.checkpoint('TRUNCATE');
    expect(result.busy).toBe(0);
  });
});
