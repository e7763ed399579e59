import { createServer, IncomingMessage, Server, ServerResponse } from 'http';
import { AddressInfo } from 'net';
import { AuditService } from '../services/AuditService';
import { ClearHaltRequest, ClearHaltResult, EngineStatus } from '../services/TradingLoop';
import { errorMessage } from '../utils/ErrorHandler';

/**
 * Operator control server: engine health, status and the event stream over HTTP/JSON
 */

/** The engine surface the control server drives */
export interface ControlTarget {
  getStatus(): EngineStatus;
  clearHalt(request: ClearHaltRequest): Promise<ClearHaltResult>;
  stop(): Promise<void>;
}

export interface ControlServerOptions {
  host: string;
  port: number;
}

export interface ApiResponse {
  status: number;
  body: unknown;
}

export type HealthState = 'healthy' | 'degraded' | 'halted' | 'stopped';

const MAX_BODY_BYTES = 64 * 1024;

export class ControlServer {
  private readonly server: Server;
  private readonly engine: ControlTarget;
  private readonly auditService: AuditService;
  private readonly options: ControlServerOptions;
  private pendingStop?: Promise<void>;

  constructor(engine: ControlTarget, auditService: AuditService, options: ControlServerOptions) {
    this.engine = engine;
    this.auditService = auditService;
    this.options = options;
    this.server = createServer((req, res) => {
      this.handleRequest(req, res).catch(error => {
        console.error('Control server error:', errorMessage(error));
        if (!res.headersSent) {
          this.send(res, { status: 500, body: { error: 'Internal server error' } });
        } else {
          res.end();
        }
      });
    });
  }

  private async handleRequest(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const method = req.method ?? 'GET';

    res.setHeader('Access-Control-Allow-Origin', '*');
    res.setHeader('Access-Control-Allow-Methods', 'GET, POST, OPTIONS');
    res.setHeader('Access-Control-Allow-Headers', 'Content-Type');

    if (method === 'OPTIONS') {
      res.writeHead(204);
      res.end();
      return;
    }

    let body = '';
    if (method === 'POST') {
      const read = await this.readBody(req);
      if (read === undefined) {
        this.send(res, { status: 413, body: { error: 'Request body too large' } });
        return;
      }
      body = read;
    }

    this.send(res, await this.route(method, req.url ?? '/', body));
  }

  private async readBody(req: IncomingMessage): Promise<string | undefined> {
    const chunks: Buffer[] = [];
    let size = 0;
    for await (const chunk of req) {
      const buffer = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
      size += buffer.length;
      if (size > MAX_BODY_BYTES) {
        return undefined;
      }
      chunks.push(buffer);
    }
    return Buffer.concat(chunks).toString('utf8');
  }

  private send(res: ServerResponse, response: ApiResponse): void {
    res.writeHead(response.status, { 'Content-Type': 'application/json' });
    res.end(JSON.stringify(response.body));
  }

  /**
   * Routes one API request. Exposed so routing can be exercised without a socket.
   */
  async route(method: string, rawUrl: string, body = ''): Promise<ApiResponse> {
    const url = new URL(rawUrl, 'http://control.local');

    switch (url.pathname) {
      case '/api/health':
        return method === 'GET' ? this.health() : this.methodNotAllowed('GET');
      case '/api/status':
        return method === 'GET' ? { status: 200, body: this.engine.getStatus() } : this.methodNotAllowed('GET');
      case '/api/events':
        return method === 'GET' ? this.events(url.searchParams) : this.methodNotAllowed('GET');
      case '/api/halt/clear':
        return method === 'POST' ? this.clearHalt(body) : this.methodNotAllowed('POST');
      case '/api/stop':
        return method === 'POST' ? this.requestEngineStop() : this.methodNotAllowed('POST');
      default:
        return { status: 404, body: { error: 'API endpoint not found' } };
    }
  }

  private health(): ApiResponse {
    const status = this.engine.getStatus();
    let state: HealthState;
    if (!status.running) {
      state = 'stopped';
    } else if (status.halted) {
      state = 'halted';
    } else if (status.connectors.some(connector => connector.status !== 'healthy')) {
      state = 'degraded';
    } else {
      state = 'healthy';
    }

    return {
      status: state === 'healthy' || state === 'degraded' ? 200 : 503,
      body: {
        status: state,
        timestamp: new Date(),
        cycleCount: status.cycleCount,
        lastCycle: status.lastCycle?.outcome,
        components: Object.fromEntries(status.connectors.map(connector => [connector.role, connector]))
      }
    };
  }

  private events(params: URLSearchParams): ApiResponse {
    const since = params.get('since');
    let start: Date | undefined;
    if (since !== null) {
      start = new Date(since);
      if (Number.isNaN(start.getTime())) {
        return { status: 400, body: { error: `Invalid since timestamp: ${since}` } };
      }
    }

    const type = params.get('type');
    const events = this.auditService
      .exportEvents(start)
      .filter(event => type === null || event.eventType === type);
    return { status: 200, body: events };
  }

  private async clearHalt(body: string): Promise<ApiResponse> {
    let parsed: unknown;
    try {
      parsed = body.length > 0 ? JSON.parse(body) : {};
    } catch (error) {
      return { status: 400, body: { error: `Invalid JSON body: ${errorMessage(error)}` } };
    }

    if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
      return { status: 400, body: { error: 'Body must be a JSON object' } };
    }

    const operator = 'operator' in parsed ? parsed.operator : undefined;
    const rehedge = 'rehedge' in parsed ? parsed.rehedge : undefined;
    if (typeof operator !== 'string' || operator.trim().length === 0) {
      return { status: 400, body: { error: 'operator is required' } };
    }
    if (rehedge !== undefined && typeof rehedge !== 'boolean') {
      return { status: 400, body: { error: 'rehedge must be a boolean' } };
    }

    const result = await this.engine.clearHalt({ operator: operator.trim(), rehedge: rehedge ?? false });
    return { status: result.cleared ? 200 : 409, body: result };
  }

  private requestEngineStop(): ApiResponse {
    if (!this.pendingStop) {
      this.pendingStop = this.engine.stop().catch(error => {
        console.error('Engine stop failed:', errorMessage(error));
      });
    }
    return { status: 202, body: { stopping: true } };
  }

  private methodNotAllowed(allowed: string): ApiResponse {
    return { status: 405, body: { error: `Method not allowed; use ${allowed}` } };
  }

  /**
   * Resolves once the engine stop requested through the API has finished
   */
  whenStopRequested(): Promise<void> | undefined {
    return this.pendingStop;
  }

  public start(): Promise<AddressInfo> {
    return new Promise((resolve, reject) => {
      this.server.once('error', reject);
      this.server.listen(this.options.port, this.options.host, () => {
        this.server.off('error', reject);
        const address = this.server.address();
        if (address === null || typeof address === 'string') {
          reject(new Error('Control server did not bind to a TCP address'));
          return;
        }
        resolve(address);
      });
    });
  }

  public stop(): Promise<void> {
    return new Promise((resolve, reject) => {
      if (!this.server.listening) {
        resolve();
        return;
      }
      this.server.close(error => (error ? reject(error) : resolve()));
    });
  }
}
