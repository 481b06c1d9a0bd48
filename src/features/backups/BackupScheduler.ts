import fs from 'fs-extra';
import path from 'path';
import archiver from 'archiver';
import extract from 'extract-zip';
import { BackupRecord, BackupResult, RetentionPolicy } from '../../../shared/types';
import { ErrorCode } from '../../../shared/errorCodes';
import { Logger } from '../../utils/logger';
import { AppError, errorMessage } from '../../utils/AppError';
import { sleep, Sleeper } from '../../utils/sleep';
import { MetricRecorder } from '../metrics/MetricRecorder';
import { AlertSink } from '../alerts/AlertSink';
import { ObjectStorageUploader } from './ObjectStorageUploader';
import {
    backupFilename,
    isExcluded,
    matchesPattern,
    parseBackupFilename,
    verifyZipArchive
} from './archiveUtils';

const PARTIAL_SUFFIX = '.partial';
const UPLOADED_SUFFIX = '.uploaded';
const DAY_MS = 24 * 60 * 60 * 1000;

export interface BackupSchedulerOptions {
    sourceDir: string;
    backupDir: string;
    include: string[];
    exclude: string[];
    maxBackups: number;
    retentionDays: number; // 0 = no age bound
    intervalMs: number;
    remotePrefix?: string;
}

export interface BackupSchedulerDeps {
    logger: Logger;
    metrics: MetricRecorder;
    alerts: AlertSink;
    uploader?: ObjectStorageUploader;
    verifyArchive?: (file: string) => Promise<boolean>;
    clock?: () => Date;
    sleep?: Sleeper;
}

interface SourceEntry {
    name: string;
    isDirectory: boolean;
}

export class BackupScheduler {
    private readonly logger: Logger;
    private readonly metrics: MetricRecorder;
    private readonly alerts: AlertSink;
    private readonly uploader?: ObjectStorageUploader;
    private readonly verifyArchive: (file: string) => Promise<boolean>;
    private readonly clock: () => Date;
    private readonly sleep: Sleeper;

    constructor(private readonly options: BackupSchedulerOptions, deps: BackupSchedulerDeps) {
        this.logger = deps.logger;
        this.metrics = deps.metrics;
        this.alerts = deps.alerts;
        this.uploader = deps.uploader;
        this.verifyArchive = deps.verifyArchive ?? verifyZipArchive;
        this.clock = deps.clock ?? (() => new Date());
        this.sleep = deps.sleep ?? sleep;
    }

    get policy(): RetentionPolicy {
        return { maxBackups: this.options.maxBackups, retentionDays: this.options.retentionDays };
    }

    /**
     * Archive -> verify -> publish -> upload -> cleanup.
     * Never throws; a corrupt archive is removed before this resolves.
     */
    async snapshot(): Promise<BackupResult> {
        return this.createSnapshot(true);
    }

    // List all retained backups, newest first
    async list(): Promise<BackupRecord[]> {
        const dir = this.options.backupDir;
        if (!(await fs.pathExists(dir))) return [];

        const files = await fs.readdir(dir);
        const records: { record: BackupRecord; sequence: number }[] = [];

        for (const filename of files) {
            const parsed = parseBackupFilename(filename);
            if (!parsed) continue;

            const filePath = path.join(dir, filename);
            try {
                const stats = await fs.stat(filePath);
                records.push({
                    sequence: parsed.sequence,
                    record: {
                        path: filePath,
                        filename,
                        createdAt: parsed.createdAt.toISOString(),
                        sizeBytes: stats.size,
                        uploaded: files.includes(filename + UPLOADED_SUFFIX)
                    }
                });
            } catch (e) {
                // Removed by a concurrent cleanup between readdir and stat
                this.logger.debug(`[BackupScheduler] Skipping vanished backup ${filename}: ${errorMessage(e)}`);
            }
        }

        records.sort((a, b) =>
            new Date(b.record.createdAt).getTime() - new Date(a.record.createdAt).getTime() ||
            b.sequence - a.sequence
        );
        return records.map(r => r.record);
    }

    /**
     * Deletes backups beyond the count bound (oldest first) and older than the age bound.
     * Returns the number of archives removed.
     */
    async cleanup(policy: RetentionPolicy = this.policy): Promise<number> {
        const backups = await this.list();
        const cutoff = this.clock().getTime() - policy.retentionDays * DAY_MS;

        const toDelete = backups.filter((backup, index) =>
            index >= policy.maxBackups ||
            (policy.retentionDays > 0 && new Date(backup.createdAt).getTime() < cutoff)
        );

        for (const backup of toDelete) {
            this.logger.debug(`[BackupScheduler] Removing old backup: ${backup.filename}`);
            // fs.remove ignores files a concurrent cleanup already deleted
            await fs.remove(backup.path);
            await fs.remove(backup.path + UPLOADED_SUFFIX);
        }

        if (toDelete.length > 0) {
            this.logger.info(`[BackupScheduler] Cleaned up ${toDelete.length} old backup(s)`);
        }
        return toDelete.length;
    }

    /**
     * Restores an archive over the source directory. A safety snapshot of the
     * current state is taken first; failing to take it is only a warning.
     */
    async restore(nameOrPath: string): Promise<BackupRecord> {
        const archivePath = path.isAbsolute(nameOrPath)
            ? nameOrPath
            : path.join(this.options.backupDir, path.basename(nameOrPath));

        if (!(await fs.pathExists(archivePath))) {
            throw new AppError('E_BACKUP_NOT_FOUND', `Backup file not found: ${nameOrPath}`);
        }

        this.logger.info(`[BackupScheduler] Restoring backup: ${path.basename(archivePath)}`);

        // Skip cleanup here so the archive being restored cannot be rotated away
        const safety = await this.createSnapshot(false);
        if (!safety.ok) {
            this.logger.warn('[BackupScheduler] Failed to create pre-restore backup');
        }

        try {
            await extract(archivePath, { dir: path.resolve(this.options.sourceDir) });
        } catch (e) {
            throw new AppError('E_RESTORE_FAILED', `Failed to restore backup: ${errorMessage(e)}`, true, { archivePath });
        }
        this.logger.success(`[BackupScheduler] Backup restored successfully`);

        await this.cleanup();

        const stats = await fs.stat(archivePath);
        const parsed = parseBackupFilename(path.basename(archivePath));
        return {
            path: archivePath,
            filename: path.basename(archivePath),
            createdAt: (parsed?.createdAt ?? stats.mtime).toISOString(),
            sizeBytes: stats.size,
            uploaded: await fs.pathExists(archivePath + UPLOADED_SUFFIX)
        };
    }

    /**
     * Interval trigger. Sleeps first: the startup backup is taken by the supervisor.
     */
    async run(signal: AbortSignal): Promise<void> {
        this.logger.info(`[BackupScheduler] Automatic backup loop started (interval: ${this.options.intervalMs / 1000}s)`);

        while (!signal.aborted) {
            await this.sleep(this.options.intervalMs, signal);
            if (signal.aborted) break;

            try {
                await this.snapshot();
            } catch (e) {
                this.logger.error(`[BackupScheduler] Scheduled backup crashed: ${errorMessage(e)}`);
            }
        }

        this.logger.info('[BackupScheduler] Automatic backup loop stopped');
    }

    private async createSnapshot(runCleanup: boolean): Promise<BackupResult> {
        const now = this.clock();
        let partialPath: string | null = null;

        try {
            await fs.ensureDir(this.options.backupDir);

            const entries = await this.resolveSources();
            if (entries.length === 0) {
                return await this.fail('E_BACKUP_EMPTY', `Nothing to back up in ${this.options.sourceDir}`);
            }

            const reserved = await this.reserveName(now);
            partialPath = reserved.partialPath;
            this.logger.info(`[BackupScheduler] Creating backup: ${reserved.filename}`);

            await this.writeArchive(partialPath, entries);

            if (!(await this.verifyArchive(partialPath))) {
                await fs.remove(partialPath);
                partialPath = null;
                return await this.fail('E_BACKUP_CORRUPT', `Backup file is corrupted: ${reserved.filename}`);
            }

            const finalPath = path.join(this.options.backupDir, reserved.filename);
            await fs.move(partialPath, finalPath);
            partialPath = null;

            const stats = await fs.stat(finalPath);
            this.logger.success(`[BackupScheduler] Backup created: ${reserved.filename} (Size: ${formatSize(stats.size)})`);

            const uploaded = await this.upload(finalPath, reserved.filename);
            const record: BackupRecord = {
                path: finalPath,
                filename: reserved.filename,
                createdAt: now.toISOString(),
                sizeBytes: stats.size,
                uploaded
            };

            if (runCleanup) await this.cleanup();

            await this.metrics.record('last_backup', record.filename);
            await this.metrics.record('last_backup_size', record.sizeBytes);
            await this.metrics.record('backup_count', (await this.list()).length);

            return { ok: true, record };
        } catch (e) {
            if (partialPath) {
                await fs.remove(partialPath).catch(err => {
                    this.logger.warn(`[BackupScheduler] Could not remove partial archive: ${errorMessage(err)}`);
                });
            }
            return this.fail('E_BACKUP_FAILED', `Failed to create backup: ${errorMessage(e)}`);
        }
    }

    private async fail(code: ErrorCode, message: string): Promise<BackupResult> {
        this.logger.error(`[BackupScheduler] ${message}`);
        await this.alerts.notify(message);
        return { ok: false, code, error: message };
    }

    // Top-level entries matching the include list, minus excludes and the backup store
    private async resolveSources(): Promise<SourceEntry[]> {
        const sourceDir = this.options.sourceDir;
        if (!(await fs.pathExists(sourceDir))) return [];

        const backupRel = this.backupStoreRelative();
        const names = await fs.readdir(sourceDir);
        const selected: SourceEntry[] = [];

        for (const name of names) {
            if (name === backupRel) continue;
            if (!this.options.include.some(pattern => matchesPattern(name, pattern))) continue;
            if (isExcluded(name, this.options.exclude)) continue;

            const stats = await fs.stat(path.join(sourceDir, name));
            selected.push({ name, isDirectory: stats.isDirectory() });
        }

        for (const pattern of this.options.include) {
            if (!pattern.includes('*') && !names.includes(pattern)) {
                this.logger.debug(`[BackupScheduler] Include entry not present, skipped: ${pattern}`);
            }
        }
        return selected;
    }

    // Claims a unique `<name>.partial`; same-second collisions get a numeric suffix
    private async reserveName(now: Date): Promise<{ filename: string; partialPath: string }> {
        for (let suffix = 0; ; suffix++) {
            const filename = backupFilename(now, suffix);
            const finalPath = path.join(this.options.backupDir, filename);
            const partialPath = finalPath + PARTIAL_SUFFIX;

            if (await fs.pathExists(finalPath)) continue;
            try {
                const fd = await fs.open(partialPath, 'wx');
                await fs.close(fd);
                return { filename, partialPath };
            } catch (e) {
                if (e instanceof Error && 'code' in e && e.code === 'EEXIST') continue;
                throw e;
            }
        }
    }

    // Backup directory relative to the source, in archive (posix) form
    private backupStoreRelative(): string {
        return path.relative(this.options.sourceDir, this.options.backupDir).split(path.sep).join('/');
    }

    private writeArchive(outputPath: string, entries: SourceEntry[]): Promise<void> {
        const { sourceDir, exclude } = this.options;
        const backupRel = this.backupStoreRelative();
        const inBackupStore = (relative: string) => relative === backupRel || relative.startsWith(`${backupRel}/`);

        return new Promise<void>((resolve, reject) => {
            const output = fs.createWriteStream(outputPath);
            const archive = archiver('zip', { zlib: { level: 9 } });

            output.on('close', () => resolve());
            output.on('error', reject);

            archive.on('warning', (err) => {
                if (err.code === 'ENOENT') {
                    this.logger.warn(`[BackupScheduler] Archive warning: ${err.message}`);
                } else {
                    reject(err);
                }
            });
            archive.on('error', (err) => {
                this.logger.error(`[BackupScheduler] Archive Error: ${err.message}`);
                reject(err);
            });

            archive.pipe(output);

            for (const entry of entries) {
                const entryPath = path.join(sourceDir, entry.name);
                if (entry.isDirectory) {
                    archive.directory(entryPath, entry.name, (data) =>
                        isExcluded(data.name, exclude) || inBackupStore(`${entry.name}/${data.name}`) ? false : data
                    );
                } else {
                    archive.file(entryPath, { name: entry.name });
                }
            }

            archive.finalize().catch(reject);
        });
    }

    private async upload(finalPath: string, filename: string): Promise<boolean> {
        if (!this.uploader) return false;

        const key = this.options.remotePrefix ? `${this.options.remotePrefix}/${filename}` : filename;
        this.logger.info(`[BackupScheduler] Uploading backup to ${this.uploader.describe(key)}...`);
        try {
            await this.uploader.upload(finalPath, key);
            await fs.writeFile(finalPath + UPLOADED_SUFFIX, new Date().toISOString());
            this.logger.success('[BackupScheduler] Backup uploaded');
            return true;
        } catch (e) {
            this.logger.warn(`[BackupScheduler] Failed to upload backup: ${errorMessage(e)}`);
            return false;
        }
    }
}

function formatSize(bytes: number): string {
    if (bytes < 1024) return `${bytes}B`;
    if (bytes < 1024 * 1024) return `${(bytes / 1024).toFixed(1)}K`;
    return `${(bytes / 1024 / 1024).toFixed(1)}M`;
}
