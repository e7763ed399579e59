export * from './Order';
export * from './OrderBook';
export * from './AuditEvent';
export * from './ConnectorStatus';
