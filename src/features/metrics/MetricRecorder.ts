import crypto from 'crypto';
import fs from 'fs-extra';
import path from 'path';
import { MetricsSnapshot } from '../../../shared/types';
import { Logger } from '../../utils/logger';
import { errorMessage } from '../../utils/AppError';

export interface MetricRecorderOptions {
    file: string;
    enabled?: boolean;
    clock?: () => number; // epoch ms
}

/**
 * Flat key -> {value, timestamp} store persisted as JSON.
 * Each write lands in a unique temp file that is renamed over the target,
 * so external readers only ever see a complete document.
 */
export class MetricRecorder {
    private readonly file: string;
    private readonly enabled: boolean;
    private readonly clock: () => number;
    private queue: Promise<void> = Promise.resolve();

    constructor(private readonly logger: Logger, options: MetricRecorderOptions) {
        this.file = options.file;
        this.enabled = options.enabled ?? true;
        this.clock = options.clock ?? Date.now;
    }

    get path(): string {
        return this.file;
    }

    /** Best-effort: never rejects. */
    record(key: string, value: string | number): Promise<void> {
        if (!this.enabled) return Promise.resolve();

        const entry = { value: String(value), timestamp: Math.floor(this.clock() / 1000) };
        // Serialize in-process writers so a read-modify-write never loses an update
        const next = this.queue.then(() => this.write(key, entry));
        this.queue = next;
        return next;
    }

    async read(): Promise<MetricsSnapshot> {
        try {
            if (!(await fs.pathExists(this.file))) return {};
            const parsed: unknown = await fs.readJson(this.file);
            return isSnapshot(parsed) ? parsed : {};
        } catch (e) {
            this.logger.debug(`[MetricRecorder] Unreadable metrics file, starting fresh: ${errorMessage(e)}`);
            return {};
        }
    }

    private async write(key: string, entry: MetricsSnapshot[string]): Promise<void> {
        const tempFile = `${this.file}.${process.pid}.${crypto.randomUUID()}.tmp`;
        try {
            const metrics = await this.read();
            metrics[key] = entry;

            await fs.ensureDir(path.dirname(this.file));
            await fs.writeJson(tempFile, metrics, { spaces: 2 });
            await fs.rename(tempFile, this.file);
        } catch (e) {
            this.logger.warn(`[MetricRecorder] Failed to record ${key}: ${errorMessage(e)}`);
            await fs.remove(tempFile).catch(err => {
                this.logger.debug(`[MetricRecorder] Temp cleanup failed: ${errorMessage(err)}`);
            });
        }
    }
}

function isSnapshot(value: unknown): value is MetricsSnapshot {
    if (typeof value !== 'object' || value === null || Array.isArray(value)) return false;
    return Object.values(value).every(entry =>
        typeof entry === 'object' && entry !== null && 'value' in entry && 'timestamp' in entry
    );
}
