import { mkdtempSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { INestApplication } from '@nestjs/common';
import { Test, TestingModule } from '@nestjs/testing';
import request from 'supertest';
import { AppModule } from '../src/app.module';
import { configureApp } from '../src/app.setup';

const tempHigh = {
  channel_id: 1001,
  data_type: 'T',
  point_id: 1,
  rule_name: 'temp-high',
  warning_level: 2,
  operator: '>',
  value: 85.0,
};

describe('Alert rules API (e2e)', () => {
  let app: INestApplication;
  let workDir: string;
  let savedPath: string | undefined;

  beforeAll(async () => {
    workDir = mkdtempSync(join(tmpdir(), 'alarm-rules-e2e-'));
    savedPath = process.env.DATABASE_PATH;
    process.env.DATABASE_PATH = join(workDir, 'rules.db');

    const moduleFixture: TestingModule = await Test.createTestingModule({
      imports: [AppModule],
    }).compile();

    app = moduleFixture.createNestApplication({ logger: false });
    configureApp(app);
    await app.init();
  });

  afterAll(async () => {
    await app.close();
    rmSync(workDir, { recursive: true, force: true });
    if (savedPath === undefined) {
      delete process.env.DATABASE_PATH;
    } else {
      process.env.DATABASE_PATH = savedPath;
    }
  });

  it('creates a rule with the first id', async () => {
    const response = await request(app.getHttpServer()).post('/alarmApi/rules').send(tempHigh).expect(201);

    expect(response.body.success).toBe(true);
    expect(response.body.data).toMatchObject({
      id: 1,
      ...tempHigh,
      value: 85,
      enabled: true,
      description: '',
    });
  });

  it('rejects the same rule tuple with 409', async () => {
    const response = await request(app.getHttpServer())
      .post('/alarmApi/rules')
      .send({ ...tempHigh, value: 90 })
      .expect(409);

    expect(response.body).toMatchObject({
      statusCode: 409,
      error: 'DuplicateRuleException',
      tuple: { channel_id: 1001, data_type: 'T', point_id: 1, rule_name: 'temp-high' },
    });
  });

  it('lists the rules of a channel', async () => {
    const response = await request(app.getHttpServer()).get('/alarmApi/rules?channel_id=1001').expect(200);

    expect(response.body.data.total).toBe(1);
    expect(response.body.data.list[0].rule_name).toBe('temp-high');

    const other = await request(app.getHttpServer()).get('/alarmApi/rules?channel_id=2002').expect(200);
    expect(other.body.data.total).toBe(0);
  });

  it('searches with paging', async () => {
    const response = await request(app.getHttpServer())
      .get('/alarmApi/rules/search?keyword=temp&page=1&page_size=5')
      .expect(200);

    expect(response.body.data.total).toBe(1);
    expect(response.body.data.list.map((rule: { id: number }) => rule.id)).toEqual([1]);
  });

  it('disables a rule and drops it from the point lookup', async () => {
    const point = await request(app.getHttpServer()).get('/alarmApi/rules/point/1001/T/1').expect(200);
    expect(point.body.data.total).toBe(1);

    const response = await request(app.getHttpServer()).post('/alarmApi/rules/1/disable').expect(200);
    expect(response.body.data.enabled).toBe(false);

    const after = await request(app.getHttpServer()).get('/alarmApi/rules/point/1001/T/1').expect(200);
    expect(after.body.data.total).toBe(0);
  });

  it('replaces a rule', async () => {
    const response = await request(app.getHttpServer())
      .put('/alarmApi/rules/1')
      .send({ ...tempHigh, value: 92.5, description: 'boiler outlet' })
      .expect(200);

    expect(response.body.data).toMatchObject({ id: 1, value: 92.5, description: 'boiler outlet', enabled: true });
  });

  it('returns 404 when replacing an unknown rule', async () => {
    const response = await request(app.getHttpServer()).put('/alarmApi/rules/99').send(tempHigh).expect(404);

    expect(response.body.message).toBe('Alert rule with ID 99 not found');
  });

  it('rejects an invalid data type with 400 naming the field', async () => {
    const response = await request(app.getHttpServer())
      .post('/alarmApi/rules')
      .send({ ...tempHigh, data_type: 'X' })
      .expect(400);

    expect(response.body.field).toBe('data_type');
  });

  it('rejects a missing field and unknown properties', async () => {
    const { rule_name: _omitted, ...withoutName } = tempHigh;
    const missing = await request(app.getHttpServer()).post('/alarmApi/rules').send(withoutName).expect(400);
    expect(missing.body.message).toBe('Invalid rule_name: is required');

    const extra = await request(app.getHttpServer())
      .post('/alarmApi/rules')
      .send({ ...tempHigh, rule_name: 'temp-other', service_type: 'pump' })
      .expect(400);
    expect(extra.body.field).toBe('service_type');
  });

  it('rejects an unknown data type in the point lookup', async () => {
    const response = await request(app.getHttpServer()).get('/alarmApi/rules/point/1001/Q/1').expect(400);

    expect(response.body.field).toBe('data_type');
  });

  it('deletes a rule', async () => {
    await request(app.getHttpServer()).delete('/alarmApi/rules/1').expect(200);

    const response = await request(app.getHttpServer()).get('/alarmApi/rules/1').expect(404);
    expect(response.body.message).toBe('Alert rule with ID 1 not found');

    await request(app.getHttpServer()).delete('/alarmApi/rules/1').expect(404);
  });

  it('keeps ids increasing after a delete', async () => {
    const response = await request(app.getHttpServer()).post('/alarmApi/rules').send(tempHigh).expect(201);

    expect(response.body.data.id).toBe(2);
  });

  it('reports rule statistics', async () => {
    const response = await request(app.getHttpServer()).get('/alarmApi/rules/statistics').expect(200);

    expect(response.body.data).toEqual({ total: 1, enabled: 1, disabled: 0 });
  });

  it('reports database health', async () => {
    const response = await request(app.getHttpServer()).get('/alarmApi/health/database').expect(200);

    expect(response.body).toMatchObject({
      status: 'ok',
      journalMode: 'wal',
      rules: { total: 1, enabled: 1 },
    });
  });
});
