import { metrics, type Counter, type Histogram, ValueType } from '@opentelemetry/api';
import type { Config } from '@/config';
import type { EntityAccessMetricAttributes } from '@/telemetry/types';

interface MetricState {
  entityAccessTotal: Counter;
  entityAccessDurationMs: Histogram;
  uploadBytesTotal: Counter;
}

let metricState: MetricState | null = null;

export const initMetrics = (config: Config): void => {
  if (!config.telemetry.enabled) {
    metricState = null;
    return;
  }

  const meter = metrics.getMeter(config.telemetry.serviceName, config.telemetry.serviceVersion);
  metricState = {
    entityAccessTotal: meter.createCounter('synapse.entity_access_total', {
      description: 'Count of entity reads, writes and metadata lookups',
      valueType: ValueType.INT,
    }),
    entityAccessDurationMs: meter.createHistogram('synapse.entity_access_duration_ms', {
      description: 'Duration of entity operations in milliseconds',
      unit: 'ms',
      valueType: ValueType.DOUBLE,
    }),
    uploadBytesTotal: meter.createCounter('synapse.upload_bytes_total', {
      description: 'Bytes sent to storage through multipart uploads',
      unit: 'By',
      valueType: ValueType.INT,
    }),
  };
};

export const isMetricsEnabled = (): boolean => metricState !== null;

export const recordEntityAccess = (attributes: EntityAccessMetricAttributes, durationMs: number): void => {
  if (!metricState) {
    return;
  }

  const labels = {
    operation: attributes.operation,
    entity_id: attributes.entityId,
    result: attributes.result,
  };

  metricState.entityAccessTotal.add(1, labels);
  metricState.entityAccessDurationMs.record(durationMs, labels);
};

export const recordUploadBytes = (bytes: number, parentFolderId: string): void => {
  if (!metricState || bytes <= 0) {
    return;
  }

  metricState.uploadBytesTotal.add(bytes, { parent_id: parentFolderId });
};
