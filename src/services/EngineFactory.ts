/**
 * Wires venues, pricing, risk, lifecycle and hedging into a runnable trading loop
 */

import { IPrimaryVenueConnector, ISecondaryVenueConnector } from '../connectors/VenueConnector';
import { DydxConnector } from '../connectors/venues/DydxConnector';
import { HyperliquidConnector } from '../connectors/venues/HyperliquidConnector';
import { PaperVenueConnector } from '../connectors/venues/PaperVenueConnector';
import { EngineConfig, primarySymbol, secondarySymbol } from '../config/ConfigurationManager';
import { AuditService } from './AuditService';
import { FillDetector } from './FillDetector';
import { HedgeExecutor } from './HedgeExecutor';
import { OrderLifecycleManager } from './OrderLifecycleManager';
import { createPricingAlgorithm } from './PricingAlgorithm';
import { RestingOrderState } from './RestingOrderState';
import { RiskGuard } from './RiskGuard';
import { TradingLoop } from './TradingLoop';
import { ConfigurationError, ErrorHandler, SleepFn, buildBackoffPolicyTable } from '../utils/ErrorHandler';

export type VenuePair =
  | { mode: 'paper'; primary: PaperVenueConnector; secondary: PaperVenueConnector }
  | { mode: 'live'; primary: IPrimaryVenueConnector; secondary: ISecondaryVenueConnector };

export interface Engine {
  config: EngineConfig;
  venues: VenuePair;
  auditService: AuditService;
  errorHandler: ErrorHandler;
  riskGuard: RiskGuard;
  restingOrders: RestingOrderState;
  lifecycle: OrderLifecycleManager;
  fillDetector: FillDetector;
  hedgeExecutor: HedgeExecutor;
  loop: TradingLoop;
}

export interface EngineOptions {
  sleep?: SleepFn;
  now?: () => Date;
  auditService?: AuditService;
}

/**
 * Builds the venue connectors for the configured mode
 */
export function createVenues(config: EngineConfig, sleep?: SleepFn): VenuePair {
  if (config.venues.mode === 'paper') {
    return {
      mode: 'paper',
      primary: new PaperVenueConnector('dydx', 'primary', { sleep }),
      secondary: new PaperVenueConnector('hyperliquid', 'secondary', { sleep })
    };
  }

  const { primary, secondary } = config.venues;
  if (!primary.credentials || !secondary.credentials) {
    throw new ConfigurationError('Live mode requires credentials for both venues');
  }

  return {
    mode: 'live',
    primary: new DydxConnector({
      gatewayUrl: primary.gatewayUrl,
      indexerUrl: primary.publicUrl,
      credentials: primary.credentials,
      requestTimeoutMs: primary.requestTimeoutMs,
      sleep
    }),
    secondary: new HyperliquidConnector({
      gatewayUrl: secondary.gatewayUrl,
      infoUrl: secondary.publicUrl,
      credentials: secondary.credentials,
      requestTimeoutMs: secondary.requestTimeoutMs,
      sleep
    })
  };
}

export function createEngine(config: EngineConfig, venues: VenuePair, options: EngineOptions = {}): Engine {
  const auditService = options.auditService ?? new AuditService({
    signingKey: config.audit.signingKey ? Buffer.from(config.audit.signingKey, 'utf8') : undefined,
    maxEvents: config.audit.maxEvents
  });

  const errorHandler = new ErrorHandler(buildBackoffPolicyTable({
    errorBackoffMs: config.trading.errorBackoffMs,
    cycleIntervalMs: config.trading.cycleIntervalMs,
    hedgeMaxRetries: config.hedge.maxRetries,
    hedgeBaseBackoffMs: config.hedge.baseBackoffMs,
    hedgeBackoffMultiplier: config.hedge.backoffMultiplier,
    hedgeMaxBackoffMs: config.hedge.maxBackoffMs
  }), options.sleep);

  const pricing = createPricingAlgorithm(config.trading.pricingStrategy);
  const riskGuard = new RiskGuard(config.risk, options.now);
  const restingOrders = new RestingOrderState();

  const lifecycle = new OrderLifecycleManager(restingOrders, venues.primary, riskGuard, auditService, {
    instrument: primarySymbol(config),
    repriceThreshold: config.trading.repriceThreshold
  });
  const fillDetector = new FillDetector(restingOrders, venues.primary, auditService);
  const hedgeExecutor = new HedgeExecutor(venues.secondary, errorHandler, riskGuard, auditService, secondarySymbol(config));

  const loop = new TradingLoop({
    instrument: primarySymbol(config),
    secondaryInstrument: secondarySymbol(config),
    tradeSize: config.trading.tradeSize,
    cycleIntervalMs: config.trading.cycleIntervalMs,
    errorBackoffMs: config.trading.errorBackoffMs,
    cancelOnHalt: config.trading.cancelOnHalt
  }, {
    primary: venues.primary,
    secondary: venues.secondary,
    pricing,
    lifecycle,
    fillDetector,
    hedgeExecutor,
    riskGuard,
    errorHandler,
    auditService,
    sleep: options.sleep
  });

  return {
    config,
    venues,
    auditService,
    errorHandler,
    riskGuard,
    restingOrders,
    lifecycle,
    fillDetector,
    hedgeExecutor,
    loop
  };
}
