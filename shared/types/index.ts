// --- Shared Supervisor Types ---

export * from './health';

export type SupervisorState =
    | 'STARTING'
    | 'RUNNING'
    | 'EXITED_CLEAN'
    | 'EXITED_CRASH'
    | 'RESTART_WAIT'
    | 'TERMINAL_FAILURE'
    | 'STOPPED_BY_SIGNAL';

export interface StateTransition {
    from: SupervisorState | null;
    to: SupervisorState;
    attempt: number;
    at: string; // ISO timestamp
    reason?: string;
}

export interface RestartState {
    attemptCount: number;
    maxAttempts: number;
    restartDelayMs: number; // fixed, not exponential
}

export interface ExitStatus {
    code: number | null;
    signal: NodeJS.Signals | null;
}

export interface CommandSpec {
    file: string;
    args: string[];
    cwd?: string;
    env?: NodeJS.ProcessEnv;
}

export interface BackupRecord {
    path: string;
    filename: string;
    createdAt: string; // ISO timestamp
    sizeBytes: number;
    uploaded: boolean;
}

export interface RetentionPolicy {
    maxBackups: number;
    retentionDays: number; // 0 = no age bound
}

export type BackupResult =
    | { ok: true; record: BackupRecord }
    | { ok: false; code: string; error: string };

export interface MetricEntry {
    value: string;
    timestamp: number; // epoch seconds
}

export type MetricsSnapshot = Record<string, MetricEntry>;

export type AlertSeverity = 'warning' | 'critical';
