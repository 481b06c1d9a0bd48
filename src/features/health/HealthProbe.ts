import { HealthVerdict, ProcessSample } from '../../../shared/types';
import { Logger } from '../../utils/logger';
import { errorMessage } from '../../utils/AppError';
import { sleep, Sleeper } from '../../utils/sleep';
import { MetricRecorder } from '../metrics/MetricRecorder';
import { AlertSink } from '../alerts/AlertSink';
import { SystemInspector } from './SystemInspector';

export interface HealthProbeOptions {
    processPattern: string;
    port: number;
    workDir: string;
    intervalMs: number;
    maxMemoryMb?: number; // 0 or unset = no ceiling
    diskUsageThreshold?: number;
    checkImmediately?: boolean; // standalone mode checks before the first sleep
}

export interface HealthProbeDeps {
    logger: Logger;
    metrics: MetricRecorder;
    alerts: AlertSink;
    inspector: SystemInspector;
    sleep?: Sleeper;
}

/**
 * One probe cycle: process -> port -> memory -> disk.
 * A missing process short-circuits the cycle; the other checks are independent.
 */
export class HealthProbe {
    private readonly logger: Logger;
    private readonly metrics: MetricRecorder;
    private readonly alerts: AlertSink;
    private readonly inspector: SystemInspector;
    private readonly sleep: Sleeper;

    constructor(private readonly options: HealthProbeOptions, deps: HealthProbeDeps) {
        this.logger = deps.logger;
        this.metrics = deps.metrics;
        this.alerts = deps.alerts;
        this.inspector = deps.inspector;
        this.sleep = deps.sleep ?? sleep;
    }

    async runCycle(): Promise<HealthVerdict> {
        const timestamp = new Date().toISOString();

        // 1. Process liveness
        let sample: ProcessSample | null = null;
        try {
            sample = await this.inspector.findProcess(this.options.processPattern);
        } catch (e) {
            this.logger.warn(`[HealthProbe] Process lookup failed: ${errorMessage(e)}`);
        }

        if (!sample) {
            await this.metrics.record('server_running', '0');
            await this.alerts.notify('Server process is not running!');
            return Object.freeze({
                processAlive: false,
                portListening: false,
                memoryMb: 0,
                exceededMemoryLimit: false,
                diskUsagePercent: null,
                timestamp
            });
        }
        await this.metrics.record('server_running', '1');

        const [portListening, memory, diskUsagePercent] = await Promise.all([
            this.checkPort(),
            this.checkMemory(sample),
            this.checkDisk()
        ]);

        return Object.freeze({
            processAlive: true,
            portListening,
            memoryMb: memory.memoryMb,
            exceededMemoryLimit: memory.exceeded,
            diskUsagePercent,
            timestamp
        });
    }

    /**
     * Cycles until `signal` aborts. A failing cycle is logged and the loop goes on.
     */
    async run(signal: AbortSignal): Promise<void> {
        this.logger.info(`[HealthProbe] Health monitoring started (interval: ${this.options.intervalMs / 1000}s)`);
        let first = true;

        while (!signal.aborted) {
            if (!(first && this.options.checkImmediately)) {
                await this.sleep(this.options.intervalMs, signal);
                if (signal.aborted) break;
            }
            first = false;

            try {
                const verdict = await this.runCycle();
                this.logger.debug(`[HealthProbe] ${JSON.stringify(verdict)}`);
            } catch (e) {
                this.logger.error(`[HealthProbe] Health cycle failed: ${errorMessage(e)}`);
            }
        }

        this.logger.info('[HealthProbe] Health monitoring stopped');
    }

    // 2. Listening port
    private async checkPort(): Promise<boolean> {
        const port = this.options.port;
        try {
            const listening = await this.inspector.isPortListening(port);
            await this.metrics.record('port_listening', listening ? '1' : '0');
            if (!listening) {
                await this.alerts.notify(`Server port ${port} is not listening!`);
            }
            return listening;
        } catch (e) {
            this.logger.warn(`[HealthProbe] Port check failed: ${errorMessage(e)}`);
            return false;
        }
    }

    // 3. Memory ceiling (warn only)
    private async checkMemory(sample: ProcessSample): Promise<{ memoryMb: number; exceeded: boolean }> {
        const memoryMb = Math.round(sample.memoryMb * 100) / 100;
        const ceiling = this.options.maxMemoryMb ?? 0;
        const exceeded = ceiling > 0 && memoryMb > ceiling;
        try {
            await this.metrics.record('memory_usage', memoryMb);
            await this.metrics.record('cpu_usage', sample.cpuPercent);
            if (exceeded) {
                await this.alerts.notify(`Memory usage exceeded limit: ${memoryMb}MB > ${ceiling}MB`);
            }
        } catch (e) {
            this.logger.warn(`[HealthProbe] Memory check failed: ${errorMessage(e)}`);
        }
        return { memoryMb, exceeded };
    }

    // 4. Disk usage of the working volume
    private async checkDisk(): Promise<number | null> {
        const threshold = this.options.diskUsageThreshold ?? 90;
        try {
            const usage = await this.inspector.diskUsagePercent(this.options.workDir);
            if (usage === null) return null;

            await this.metrics.record('disk_usage', usage);
            if (usage > threshold) {
                await this.alerts.notify(`Disk usage critical: ${usage}%`);
            }
            return usage;
        } catch (e) {
            this.logger.warn(`[HealthProbe] Disk check failed: ${errorMessage(e)}`);
            return null;
        }
    }
}
