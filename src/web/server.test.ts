import { describe, it, expect, beforeEach, vi } from 'vitest';
import { ControlServer, ControlTarget } from './server';
import { AuditService } from '../services/AuditService';
import { ClearHaltRequest, ClearHaltResult, EngineStatus } from '../services/TradingLoop';
import { ConnectorStatus } from '../models/ConnectorStatus';

function connector(role: 'primary' | 'secondary', status: ConnectorStatus['status'] = 'healthy'): ConnectorStatus {
  return { connectorId: role === 'primary' ? 'dydx' : 'hyperliquid', role, name: role, status, latency: 0, errorRate: 0 };
}

class FakeEngine implements ControlTarget {
  status: EngineStatus = {
    running: true,
    halted: false,
    placementsEnabled: true,
    cycleCount: 3,
    restingOrders: [],
    unhedgedBacklog: [],
    risk: {
      primaryPosition: 0,
      secondaryPosition: 0,
      unhedgedExposure: 0,
      tradesToday: 0,
      tradingDay: '2024-05-01',
      realizedPnl: 0,
      primaryNotional: 0,
      stopLossTriggered: false
    },
    connectors: [connector('primary'), connector('secondary')]
  };
  clearRequests: ClearHaltRequest[] = [];
  clearResult: ClearHaltResult = { cleared: true, rehedged: 0, remainingBacklog: 0, message: 'Halt cleared' };
  stop = vi.fn(async () => undefined);

  getStatus(): EngineStatus {
    return this.status;
  }

  async clearHalt(request: ClearHaltRequest): Promise<ClearHaltResult> {
    this.clearRequests.push(request);
    return this.clearResult;
  }
}

describe('ControlServer', () => {
  let engine: FakeEngine;
  let audit: AuditService;
  let server: ControlServer;

  beforeEach(() => {
    engine = new FakeEngine();
    audit = new AuditService({ signingKey: Buffer.from('test-secret') });
    server = new ControlServer(engine, audit, { host: '127.0.0.1', port: 0 });
  });

  describe('health', () => {
    it('should be healthy while running with healthy connectors', async () => {
      const response = await server.route('GET', '/api/health');

      expect(response.status).toBe(200);
      expect(response.body).toMatchObject({ status: 'healthy', cycleCount: 3 });
    });

    it('should be degraded when a connector is degraded', async () => {
      engine.status.connectors = [connector('primary'), connector('secondary', 'degraded')];

      const response = await server.route('GET', '/api/health');

      expect(response.status).toBe(200);
      expect(response.body).toMatchObject({ status: 'degraded' });
    });

    it('should report halted and stopped engines as unavailable', async () => {
      engine.status.halted = true;
      expect(await server.route('GET', '/api/health')).toMatchObject({ status: 503, body: { status: 'halted' } });

      engine.status.running = false;
      expect(await server.route('GET', '/api/health')).toMatchObject({ status: 503, body: { status: 'stopped' } });
    });
  });

  it('should return the engine status', async () => {
    const response = await server.route('GET', '/api/status');

    expect(response).toEqual({ status: 200, body: engine.status });
  });

  describe('events', () => {
    it('should filter by event type', async () => {
      audit.logEvent('ENGINE_STARTED', {});
      audit.logEvent('ORDER_PLACED', { orderId: 'dydx_1' }, 'dydx');

      const response = await server.route('GET', '/api/events?type=ORDER_PLACED');

      expect(response.status).toBe(200);
      expect(response.body).toEqual([expect.objectContaining({ eventType: 'ORDER_PLACED', venueId: 'dydx' })]);
    });

    it('should reject an unreadable since timestamp', async () => {
      expect(await server.route('GET', '/api/events?since=nope')).toEqual({
        status: 400,
        body: { error: 'Invalid since timestamp: nope' }
      });
    });
  });

  describe('halt clearing', () => {
    it('should pass the operator and rehedge flag to the engine', async () => {
      const response = await server.route('POST', '/api/halt/clear', '{"operator":" alice ","rehedge":true}');

      expect(response).toEqual({ status: 200, body: engine.clearResult });
      expect(engine.clearRequests).toEqual([{ operator: 'alice', rehedge: true }]);
    });

    it('should default rehedge to false', async () => {
      await server.route('POST', '/api/halt/clear', '{"operator":"bob"}');

      expect(engine.clearRequests).toEqual([{ operator: 'bob', rehedge: false }]);
    });

    it('should answer 409 when the engine keeps the halt', async () => {
      engine.clearResult = { cleared: false, rehedged: 0, remainingBacklog: 1, message: 'Backlog remains' };

      const response = await server.route('POST', '/api/halt/clear', '{"operator":"bob","rehedge":true}');

      expect(response.status).toBe(409);
    });

    it('should validate the body', async () => {
      expect(await server.route('POST', '/api/halt/clear', '')).toEqual({ status: 400, body: { error: 'operator is required' } });
      expect(await server.route('POST', '/api/halt/clear', '[]')).toEqual({
        status: 400,
        body: { error: 'Body must be a JSON object' }
      });
      expect(await server.route('POST', '/api/halt/clear', '{"operator":"bob","rehedge":"yes"}')).toEqual({
        status: 400,
        body: { error: 'rehedge must be a boolean' }
      });
      const invalid = await server.route('POST', '/api/halt/clear', '{');
      expect(invalid.status).toBe(400);
      expect(engine.clearRequests).toEqual([]);
    });
  });

  it('should request a stop once and answer 202', async () => {
    expect(await server.route('POST', '/api/stop')).toEqual({ status: 202, body: { stopping: true } });
    expect(await server.route('POST', '/api/stop')).toEqual({ status: 202, body: { stopping: true } });

    await server.whenStopRequested();
    expect(engine.stop).toHaveBeenCalledTimes(1);
  });

  it('should reject wrong methods and unknown paths', async () => {
    expect(await server.route('POST', '/api/status')).toEqual({ status: 405, body: { error: 'Method not allowed; use GET' } });
    expect(await server.route('GET', '/api/stop')).toEqual({ status: 405, body: { error: 'Method not allowed; use POST' } });
    expect(await server.route('GET', '/api/unknown')).toEqual({ status: 404, body: { error: 'API endpoint not found' } });
  });
});
