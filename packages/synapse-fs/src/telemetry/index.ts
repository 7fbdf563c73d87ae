import type { Config } from '@/config';
import { initRootLogger, getLogger } from './logger';
import { initMetrics, isMetricsEnabled } from './metrics';
import { initTracer } from './tracer';
import type { TelemetryStatus } from './types';

const defaultStatus: TelemetryStatus = {
  enabled: false,
  initialized: false,
  metricsEnabled: false,
};

let status: TelemetryStatus = defaultStatus;

/**
 * Bind the logger, tracer and meter to the configuration. Exporters belong to the host
 * process: without a registered OpenTelemetry SDK the API calls are no-ops.
 */
export const initTelemetry = (config: Config): TelemetryStatus => {
  if (status.initialized) {
    return status;
  }

  initRootLogger(config);
  const logger = getLogger('Telemetry');

  initTracer(config);
  initMetrics(config);

  status = {
    enabled: config.telemetry.enabled,
    initialized: true,
    metricsEnabled: isMetricsEnabled(),
  };

  if (config.telemetry.enabled) {
    logger.debug({ serviceName: config.telemetry.serviceName }, 'Telemetry initialized');
  } else {
    logger.debug('Telemetry disabled by configuration');
  }

  return status;
};

export const getTelemetryStatus = (): TelemetryStatus => status;

export { getLogger } from './logger';
export { recordEntityAccess, recordUploadBytes } from './metrics';
export { withSpan } from './tracer';
export type { EntityAccessMetricAttributes, EntityOperation, TelemetryStatus } from './types';
