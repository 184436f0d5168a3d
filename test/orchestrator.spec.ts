/**
 * Emulation Orchestrator Tests - lifecycle, guards, degraded startup
 */

import * as http from 'http';
import * as net from 'net';
import { TelemetryClient } from '../api/client';
import { InvariantError } from '../common/errors';
import { EmulationOrchestrator } from '../modules/orchestrator';
import { testConfig } from './helpers';

function listenOnFreePort(): Promise<http.Server> {
  return new Promise(resolve => {
    const server = http.createServer((_req, res) => res.end());
    server.listen(0, '127.0.0.1', () => resolve(server));
  });
}

function portOf(server: http.Server): number {
  const address = server.address();
  if (address === null || typeof address === 'string') {
    throw new Error('no TCP address');
  }
  return address.port;
}

describe('EmulationOrchestrator', () => {
  let orchestrator: EmulationOrchestrator;

  beforeEach(() => {
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    jest.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(async () => {
    await orchestrator.shutdown();
    jest.restoreAllMocks();
  });

  it('walks through the lifecycle', async () => {
    orchestrator = new EmulationOrchestrator(testConfig(), { seed: 1 });
    expect(orchestrator.getPhase()).toBe('uninitialized');

    await orchestrator.initialize();
    expect(orchestrator.getPhase()).toBe('active');
    expect(orchestrator.apiAddress()).toMatch(/^http:\/\/127\.0\.0\.1:\d+$/);

    await orchestrator.shutdown();
    expect(orchestrator.getPhase()).toBe('stopped');
    expect(orchestrator.apiAddress()).toBeNull();
  });

  it('treats a second shutdown as a no-op', async () => {
    orchestrator = new EmulationOrchestrator(testConfig(), { seed: 1 });
    await orchestrator.initialize();

    await Promise.all([orchestrator.shutdown(), orchestrator.shutdown()]);
    await orchestrator.shutdown();

    expect(orchestrator.getPhase()).toBe('stopped');
  });

  it('can be shut down before it was initialized', async () => {
    orchestrator = new EmulationOrchestrator(testConfig(), { seed: 1 });

    await orchestrator.shutdown();

    expect(orchestrator.getPhase()).toBe('stopped');
    await expect(orchestrator.initialize()).rejects.toThrow(InvariantError);
  });

  it('settles in stopped when shutdown races initialization', async () => {
    orchestrator = new EmulationOrchestrator(testConfig(), { seed: 1 });

    const init = orchestrator.initialize();
    const stop = orchestrator.shutdown();
    await Promise.all([init, stop]);

    expect(orchestrator.getPhase()).toBe('stopped');
    expect(orchestrator.apiAddress()).toBeNull();
  });

  it('keeps running without an API when the port is taken', async () => {
    const blocker = await listenOnFreePort();
    try {
      orchestrator = new EmulationOrchestrator(testConfig({ api: { port: portOf(blocker) } }), { seed: 1 });

      await orchestrator.initialize();

      expect(orchestrator.getPhase()).toBe('active');
      expect(orchestrator.apiAddress()).toBeNull();
      expect(orchestrator.status().api_address).toBeNull();
      expect(orchestrator.snapshot().document.DEVS).toHaveLength(3);
    } finally {
      await new Promise<void>(resolve => blocker.close(() => resolve()));
    }
  });

  it('skips the API when disabled', async () => {
    orchestrator = new EmulationOrchestrator(testConfig({ api: { enabled: false } }), { seed: 1 });

    await orchestrator.initialize();

    expect(orchestrator.getPhase()).toBe('active');
    expect(orchestrator.apiAddress()).toBeNull();
  });

  it('rejects integration calls outside the active phase', () => {
    orchestrator = new EmulationOrchestrator(testConfig(), { seed: 1 });

    expect(() => orchestrator.feedPower(100)).toThrow(InvariantError);
    expect(() => orchestrator.snapshot()).toThrow('snapshot requires an active session (phase: uninitialized)');
  });

  it('rejects negative or non-finite power and bad unit ids', async () => {
    orchestrator = new EmulationOrchestrator(testConfig({ api: { enabled: false } }), { seed: 1 });
    await orchestrator.initialize();

    expect(() => orchestrator.feedPower(-1)).toThrow(InvariantError);
    expect(() => orchestrator.feedPower(Number.NaN)).toThrow(InvariantError);
    expect(() => orchestrator.feedPower(Number.POSITIVE_INFINITY)).toThrow(InvariantError);
    expect(() => orchestrator.evaluateUnit(3, 'x')).toThrow(InvariantError);
    expect(() => orchestrator.evaluateUnit(1.5, 'x')).toThrow(InvariantError);
    expect(() => orchestrator.feedPower(3425)).not.toThrow();
  });

  it('exposes the mining-loop surface', async () => {
    orchestrator = new EmulationOrchestrator(
      testConfig({ api: { enabled: false }, faults: { nonce_error_rate: 0, silence_enabled: false } }),
      { seed: 1 }
    );
    await orchestrator.initialize();

    expect(orchestrator.evaluateUnit(1, 42)).toBe(42);
    expect(typeof orchestrator.shouldSubmitShare()).toBe('boolean');
    expect(orchestrator.applyProfile('LOW_POWER').name).toBe('LOW_POWER');
    expect(() => orchestrator.applyProfile('TURBO')).toThrow('Unknown profile: TURBO');
    expect(orchestrator.status().current_domain).toBe('LOW_POWER');
  });

  it('summarizes its state', async () => {
    orchestrator = new EmulationOrchestrator(testConfig({ api: { enabled: false } }), { seed: 1 });
    await orchestrator.initialize();

    const status = orchestrator.status();
    expect(status).toMatchObject({
      phase: 'active',
      session_id: orchestrator.sessionId,
      device_model: 'Antminer_L7',
      current_domain: 'BALANCED',
      native_vendor: null,
      api_address: null,
      silent_unit: 0,
      share_interval_ms: 5200,
      fault_register: '0x01'
    });

    expect(orchestrator.injectFanFailure(2)).toBe(true);
    expect(orchestrator.status().fault_register).toBe('0x09');
    expect(orchestrator.restoreFan(2)).toBe(true);
    expect(orchestrator.status().fault_register).toBe('0x01');
  });

  it('drops a stalled request once the shutdown grace period runs out', async () => {
    orchestrator = new EmulationOrchestrator(testConfig({ api: { shutdown_grace_ms: 200 } }), { seed: 1 });
    await orchestrator.initialize();
    const baseUrl = orchestrator.apiAddress();
    if (!baseUrl) throw new Error('API did not start');
    const port = Number(new URL(baseUrl).port);

    const socket = net.connect(port, '127.0.0.1');
    socket.on('error', () => undefined);
    const closed = new Promise<void>(resolve => socket.once('close', () => resolve()));
    await new Promise<void>(resolve => socket.once('connect', () => resolve()));
    // Content-Length promises 100 bytes; only 7 arrive
    socket.write(
      'POST /cgi-bin/set_miner_conf.cgi HTTP/1.1\r\nHost: 127.0.0.1\r\n' +
        'Content-Type: application/json\r\nContent-Length: 100\r\n\r\n{"freq"'
    );
    await new Promise(resolve => setTimeout(resolve, 50));

    const started = Date.now();
    await orchestrator.shutdown();
    const elapsed = Date.now() - started;
    await closed;

    expect(orchestrator.getPhase()).toBe('stopped');
    expect(elapsed).toBeGreaterThanOrEqual(150);
    expect(elapsed).toBeLessThan(2000);
    expect(socket.destroyed).toBe(true);
  });

  it('serves pool-style clients over HTTP', async () => {
    orchestrator = new EmulationOrchestrator(testConfig(), { seed: 1 });
    await orchestrator.initialize();
    const baseUrl = orchestrator.apiAddress();
    if (!baseUrl) throw new Error('API did not start');
    const client = new TelemetryClient(baseUrl);

    const status = await client.getMinerStatus();
    expect(status.success).toBe(true);
    expect(status.data?.DEVS).toHaveLength(3);

    const accepted = await client.setMinerConf({ freq: 450, volt: 1225, fan: 100, 'power-strict': 2800 });
    expect(accepted).toMatchObject({ success: true, status: 200 });
    expect(orchestrator.status().current_domain).toBe('CUSTOM');

    const rejected = await client.setMinerConf({ volt: 1225, fan: 100, 'power-strict': 2800 });
    expect(rejected).toMatchObject({ success: false, status: 400 });
  });
});

describe('TelemetryClient', () => {
  it('reports a connection failure without throwing', async () => {
    const closed = await listenOnFreePort();
    const port = portOf(closed);
    await new Promise<void>(resolve => closed.close(() => resolve()));

    const result = await new TelemetryClient(`http://127.0.0.1:${port}`, 1000).getMinerStatus();

    expect(result.success).toBe(false);
    expect(result.status).toBe(0);
  });
});
