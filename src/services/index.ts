// Engine services
export * from './AuditService';
export * from './PricingAlgorithm';
export * from './RiskGuard';
export * from './RestingOrderState';
export * from './OrderLifecycleManager';
export * from './FillDetector';
export * from './HedgeExecutor';
export * from './TradingLoop';
export * from './SpreadCheck';
export * from './EngineFactory';
