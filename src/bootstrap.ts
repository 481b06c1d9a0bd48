import { SupervisorContext } from './context';
import { AwsCliUploader } from './features/backups/ObjectStorageUploader';
import { BackupScheduler } from './features/backups/BackupScheduler';
import { HealthProbe } from './features/health/HealthProbe';
import { SystemInformationInspector, SystemInspector } from './features/health/SystemInspector';
import { NativeProcessLauncher } from './features/processes/ProcessLauncher';
import { RetryExecutor } from './features/processes/RetryExecutor';
import { PreflightService } from './features/servers/PreflightService';
import { ServerSupervisor } from './features/servers/ServerSupervisor';
import { ServerUpdater } from './features/servers/ServerUpdater';

export function buildBackupScheduler(context: SupervisorContext): BackupScheduler {
    const { backup } = context.config;
    const uploader = backup.s3Bucket
        ? new AwsCliUploader({ bucket: backup.s3Bucket, region: backup.s3Region, timeoutMs: backup.uploadTimeoutMs })
        : undefined;

    return new BackupScheduler(
        {
            sourceDir: context.config.server.dir,
            backupDir: backup.dir,
            include: backup.include,
            exclude: backup.exclude,
            maxBackups: backup.maxBackups,
            retentionDays: backup.retentionDays,
            intervalMs: backup.intervalMs,
            remotePrefix: backup.s3Prefix
        },
        { logger: context.logger, metrics: context.metrics, alerts: context.alerts, uploader }
    );
}

export function buildHealthProbe(
    context: SupervisorContext,
    overrides: { intervalMs?: number; checkImmediately?: boolean } = {},
    inspector: SystemInspector = new SystemInformationInspector(context.logger)
): HealthProbe {
    const { server, health } = context.config;
    return new HealthProbe(
        {
            processPattern: server.processPattern,
            port: server.port,
            workDir: server.dir,
            intervalMs: overrides.intervalMs ?? health.intervalMs,
            maxMemoryMb: health.maxMemoryMb,
            diskUsageThreshold: health.diskUsageThreshold,
            checkImmediately: overrides.checkImmediately ?? false
        },
        { logger: context.logger, metrics: context.metrics, alerts: context.alerts, inspector }
    );
}

export function buildSupervisor(context: SupervisorContext, options: { update?: boolean } = {}): ServerSupervisor {
    const { config, logger } = context;
    const inspector = new SystemInformationInspector(logger);
    const executor = new RetryExecutor(logger);

    return new ServerSupervisor(context, {
        launcher: new NativeProcessLauncher(logger),
        preflight: new PreflightService(config.server, logger, inspector, {
            diskUsageThreshold: config.health.diskUsageThreshold
        }),
        backups: config.backup.enabled ? buildBackupScheduler(context) : undefined,
        health: buildHealthProbe(context, {}, inspector),
        updater: options.update === false ? undefined : new ServerUpdater(config.update, config.server.dir, executor, logger)
    });
}
