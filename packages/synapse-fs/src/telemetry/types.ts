export interface TelemetryStatus {
  enabled: boolean;
  initialized: boolean;
  metricsEnabled: boolean;
}

export type EntityOperation = 'read' | 'write' | 'metadata';

export interface EntityAccessMetricAttributes {
  operation: EntityOperation;
  entityId: string;
  result: 'success' | 'failure';
}
