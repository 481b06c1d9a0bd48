/**
 * Centralized Configuration
 * Every setting comes from an environment variable with a default.
 * Components receive the resolved SupervisorConfig, never process.env.
 */

import path from 'path';

export interface ServerSettings {
    dir: string;
    binary: string;
    port: number;
    configFile: string;
    profilesDir: string;
    clientMods: string;
    modIds: string[];
    serverMods: string;
    startupParams: string[];
    processPattern: string;
}

export interface RestartSettings {
    autoRestart: boolean;
    maxAttempts: number;
    delayMs: number;
    resetAfterMs: number; // 0 = never reset within one run
    stopTimeoutMs: number;
}

export interface BackupSettings {
    enabled: boolean;
    dir: string;
    intervalMs: number;
    maxBackups: number;
    retentionDays: number;
    include: string[];
    exclude: string[];
    s3Bucket: string;
    s3Region: string;
    s3Prefix: string;
    uploadTimeoutMs: number;
}

export interface HealthSettings {
    intervalMs: number;
    maxMemoryMb: number; // 0 = no ceiling
    diskUsageThreshold: number;
}

export interface MetricsSettings {
    enabled: boolean;
    file: string;
}

export interface AlertSettings {
    webhookUrl: string;
    webhookSecret: string;
    prefix: string;
    timeoutMs: number;
}

export interface LogSettings {
    file: string;
    maxSize: number;
    verbose: boolean;
}

export interface UpdateSettings {
    enabled: boolean;
    steamcmdDir: string;
    appId: string;
    user: string;
    password: string;
    betaId: string;
    betaPassword: string;
    installFlags: string[];
    attempts: number;
    initialDelayMs: number;
}

export interface SupervisorConfig {
    server: ServerSettings;
    restart: RestartSettings;
    backup: BackupSettings;
    health: HealthSettings;
    metrics: MetricsSettings;
    alerts: AlertSettings;
    log: LogSettings;
    update: UpdateSettings;
}

// Hard cap for any outbound call made from the health/backup cadence
export const MAX_OUTBOUND_TIMEOUT_MS = 5000;

export const DEFAULT_STARTUP_PARAMS = '-dologs -adminlog -netlog -freezecheck';
export const DEFAULT_BACKUP_INCLUDE = 'serverDZ.cfg;battleye;mpmissions;profiles;keys;@*';
export const DEFAULT_BACKUP_EXCLUDE = 'backups;steamcmd;steamapps;logs;cache;*.log;*.log.old;*.tmp';

// =============================================================================
// Helper Functions
// =============================================================================

type Env = Record<string, string | undefined>;

function getEnv(env: Env, key: string, defaultValue: string): string {
    return env[key] || defaultValue;
}

function getEnvBool(env: Env, key: string, defaultValue: boolean): boolean {
    const value = env[key]?.trim().toLowerCase();
    if (value === undefined || value === '') return defaultValue;
    return value === 'true' || value === '1' || value === 'yes';
}

function getEnvInt(env: Env, key: string, defaultValue: number): number {
    const value = env[key];
    if (value === undefined) return defaultValue;
    const parsed = parseInt(value, 10);
    return isNaN(parsed) || parsed < 0 ? defaultValue : parsed;
}

/** Outbound timeout in ms, kept within (0, MAX_OUTBOUND_TIMEOUT_MS]; 0 or less means the cap. */
export function boundTimeout(ms: number): number {
    return ms > 0 ? Math.min(ms, MAX_OUTBOUND_TIMEOUT_MS) : MAX_OUTBOUND_TIMEOUT_MS;
}

export function splitList(value: string, separator: string | RegExp = ';'): string[] {
    return value
        .split(separator)
        .map(item => item.trim())
        .filter(item => item.length > 0);
}

export function splitArgs(value: string): string[] {
    return splitList(value, /\s+/);
}

// =============================================================================
// Loader
// =============================================================================

export function loadConfig(env: Env = process.env): SupervisorConfig {
    const serverDir = path.resolve(getEnv(env, 'SERVER_DIR', '/mnt/server'));
    const binary = getEnv(env, 'SERVER_BINARY', 'DayZServer');

    return {
        server: {
            dir: serverDir,
            binary,
            port: getEnvInt(env, 'SERVER_PORT', 2302),
            configFile: getEnv(env, 'SERVER_CONFIG', 'serverDZ.cfg'),
            profilesDir: getEnv(env, 'SERVER_PROFILES', 'profiles'),
            clientMods: getEnv(env, 'CLIENT_MODS', '').trim(),
            modIds: splitList(getEnv(env, 'MOD_IDS', '')),
            serverMods: getEnv(env, 'SERVERMODS', '').trim(),
            startupParams: splitArgs(getEnv(env, 'STARTUP_PARAMS', DEFAULT_STARTUP_PARAMS)),
            processPattern: getEnv(env, 'PROCESS_PATTERN', binary),
        },
        restart: {
            autoRestart: getEnvBool(env, 'AUTO_RESTART', true),
            maxAttempts: Math.max(1, getEnvInt(env, 'MAX_RESTART_ATTEMPTS', 5)),
            delayMs: getEnvInt(env, 'RESTART_DELAY', 10) * 1000,
            resetAfterMs: getEnvInt(env, 'RESTART_RESET_AFTER', 0) * 1000,
            stopTimeoutMs: getEnvInt(env, 'STOP_TIMEOUT', 30) * 1000,
        },
        backup: {
            enabled: getEnvBool(env, 'AUTO_BACKUP', getEnvBool(env, 'ENABLE_BACKUPS', true)),
            dir: path.resolve(serverDir, getEnv(env, 'BACKUP_DIR', 'backups')),
            intervalMs: Math.max(1, getEnvInt(env, 'BACKUP_INTERVAL', 3600)) * 1000,
            maxBackups: Math.max(1, getEnvInt(env, 'MAX_BACKUPS', 3)),
            retentionDays: getEnvInt(env, 'BACKUP_RETENTION_DAYS', 7),
            include: splitList(getEnv(env, 'BACKUP_INCLUDE', DEFAULT_BACKUP_INCLUDE)),
            exclude: splitList(getEnv(env, 'BACKUP_EXCLUDE', DEFAULT_BACKUP_EXCLUDE)),
            s3Bucket: getEnv(env, 'BACKUP_S3_BUCKET', ''),
            s3Region: getEnv(env, 'BACKUP_S3_REGION', 'us-east-1'),
            s3Prefix: getEnv(env, 'BACKUP_S3_PREFIX', 'dayz'),
            uploadTimeoutMs: boundTimeout(getEnvInt(env, 'BACKUP_UPLOAD_TIMEOUT', 5) * 1000),
        },
        health: {
            intervalMs: Math.max(1, getEnvInt(env, 'HEALTH_CHECK_INTERVAL', 30)) * 1000,
            maxMemoryMb: getEnvInt(env, 'MAX_MEMORY', 0),
            diskUsageThreshold: getEnvInt(env, 'DISK_USAGE_THRESHOLD', 90),
        },
        metrics: {
            enabled: getEnvBool(env, 'ENABLE_MONITORING', true),
            file: path.resolve(serverDir, getEnv(env, 'METRICS_FILE', 'metrics.json')),
        },
        alerts: {
            webhookUrl: getEnv(env, 'ALERT_WEBHOOK_URL', ''),
            webhookSecret: getEnv(env, 'ALERT_WEBHOOK_SECRET', ''),
            prefix: getEnv(env, 'ALERT_PREFIX', 'Game Server Alert'),
            timeoutMs: boundTimeout(getEnvInt(env, 'ALERT_TIMEOUT', 5) * 1000),
        },
        log: {
            file: path.resolve(serverDir, getEnv(env, 'LOG_FILE', 'server.log')),
            maxSize: getEnvInt(env, 'MAX_LOG_SIZE', 52428800),
            verbose: getEnvBool(env, 'VERBOSE', false) || env.LOG_LEVEL?.toUpperCase() === 'DEBUG',
        },
        update: {
            enabled: getEnvBool(env, 'AUTO_UPDATE', false),
            steamcmdDir: path.resolve(serverDir, getEnv(env, 'STEAMCMD_DIR', 'steamcmd')),
            appId: getEnv(env, 'STEAMCMD_APPID', '223350'),
            user: getEnv(env, 'STEAM_USER', 'anonymous'),
            password: getEnv(env, 'STEAM_PASS', ''),
            betaId: getEnv(env, 'STEAMCMD_BETAID', ''),
            betaPassword: getEnv(env, 'STEAMCMD_BETAPASS', ''),
            installFlags: splitArgs(getEnv(env, 'INSTALL_FLAGS', '')),
            attempts: Math.max(1, getEnvInt(env, 'STEAMCMD_ATTEMPTS', 3)),
            initialDelayMs: getEnvInt(env, 'STEAMCMD_RETRY_DELAY', 5) * 1000,
        },
    };
}
