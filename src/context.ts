import { SupervisorConfig } from './config';
import { Logger, createLogger } from './utils/logger';
import { MetricRecorder } from './features/metrics/MetricRecorder';
import { AlertSink } from './features/alerts/AlertSink';

/**
 * Handles shared by every component, passed in at construction.
 */
export interface SupervisorContext {
    config: SupervisorConfig;
    logger: Logger;
    metrics: MetricRecorder;
    alerts: AlertSink;
}

export function createContext(config: SupervisorConfig, logger?: Logger): SupervisorContext {
    const log = logger ?? createLogger({
        file: config.log.file,
        maxSize: config.log.maxSize,
        verbose: config.log.verbose
    });

    return {
        config,
        logger: log,
        metrics: new MetricRecorder(log, { file: config.metrics.file, enabled: config.metrics.enabled }),
        alerts: new AlertSink(log, {
            webhookUrl: config.alerts.webhookUrl,
            webhookSecret: config.alerts.webhookSecret,
            prefix: config.alerts.prefix,
            timeoutMs: config.alerts.timeoutMs
        })
    };
}
