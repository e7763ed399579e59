/**
 * Connector status and health monitoring models
 */

export type VenueRole = 'primary' | 'secondary';
export type ConnectorHealthStatus = 'healthy' | 'degraded' | 'offline';

export interface ConnectorStatus {
  connectorId: string;
  role: VenueRole;
  name: string;
  status: ConnectorHealthStatus;
  lastRequestAt?: Date;
  latency: number;
  errorRate: number;
}
