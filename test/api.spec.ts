/**
 * Telemetry API Tests - CGI endpoints over supertest
 */

import request from 'supertest';
import { createTelemetryApp } from '../api/app';
import { createRng } from '../common/random';
import { deviceModels } from '../modules/device_models/registry';
import { EmulatorState } from '../modules/emulator_state';
import { manualClock, testConfig } from './helpers';

const STATUS = '/cgi-bin/get_miner_status.cgi';
const CONF = '/cgi-bin/set_miner_conf.cgi';

describe('Telemetry API', () => {
  let state: EmulatorState;

  beforeEach(() => {
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    state = new EmulatorState(testConfig(), deviceModels.resolve('Antminer_L7'), {
      clock: manualClock(1_700_000_000_000).now,
      rng: createRng(5)
    });
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('serves the status document', async () => {
    const response = await request(createTelemetryApp(state)).get(STATUS);

    expect(response.status).toBe(200);
    expect(response.headers['content-type']).toMatch(/application\/json/);
    expect(Object.keys(response.body)).toEqual(['STATUS', 'SUMMARY', 'DEVS', 'FANS', 'TEMPS']);
    expect(response.body.DEVS).toHaveLength(3);
    expect(response.body.STATUS[0].When).toBe(1_700_000_000);
  });

  it('applies a valid configuration and reflects it in the next status', async () => {
    const app = createTelemetryApp(state);

    const post = await request(app).post(CONF).send({ freq: 450, volt: 1225, fan: 100, 'power-strict': 2800 });

    expect(post.status).toBe(200);
    expect(post.body).toEqual({ success: true, message: 'Configuration updated (CUSTOM)' });
    expect(state.domain.current()).toEqual({
      name: 'CUSTOM',
      voltage_mv: 1225,
      frequency_mhz: 450,
      power_limit_w: 2800,
      fan_percent: 100
    });

    const get = await request(app).get(STATUS);
    for (const fan of get.body.FANS) {
      expect(fan.Speed).toBeGreaterThanOrEqual(5950);
      expect(fan.Speed).toBeLessThanOrEqual(6000);
    }
  });

  it('accepts numbers sent as strings', async () => {
    const response = await request(createTelemetryApp(state))
      .post(CONF)
      .send({ freq: '450', volt: '1225', fan: '80', 'power-strict': '2800' });

    expect(response.status).toBe(200);
    expect(state.domain.current().fan_percent).toBe(80);
  });

  it('rejects a body without freq and leaves the domain alone', async () => {
    const response = await request(createTelemetryApp(state))
      .post(CONF)
      .send({ volt: 1225, fan: 100, 'power-strict': 2800 });

    expect(response.status).toBe(400);
    expect(response.body.success).toBe(false);
    expect(response.body.message).toBe('Validation Error');
    expect(response.body.details).toHaveLength(1);
    expect(response.body.details[0].path).toBe('freq');
    expect(state.domain.current().name).toBe('BALANCED');
  });

  it('rejects out-of-range values', async () => {
    const response = await request(createTelemetryApp(state))
      .post(CONF)
      .send({ freq: 450, volt: 1225, fan: 150, 'power-strict': 2800 });

    expect(response.status).toBe(400);
    expect(response.body.details[0].path).toBe('fan');
    expect(state.domain.current().name).toBe('BALANCED');
  });

  it('rejects malformed JSON', async () => {
    const response = await request(createTelemetryApp(state))
      .post(CONF)
      .set('Content-Type', 'application/json')
      .send('{"freq": 45');

    expect(response.status).toBe(400);
    expect(response.body.success).toBe(false);
    expect(state.domain.current().name).toBe('BALANCED');
  });

  it('answers 404 for other paths', async () => {
    const response = await request(createTelemetryApp(state)).get('/cgi-bin/reboot.cgi');

    expect(response.status).toBe(404);
  });

  it('reports health', async () => {
    const response = await request(createTelemetryApp(state)).get('/health');

    expect(response.status).toBe(200);
    expect(response.body).toMatchObject({ status: 'ok', device_model: 'Antminer_L7', domain: 'BALANCED' });
  });
});
