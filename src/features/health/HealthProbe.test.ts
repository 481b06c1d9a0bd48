import fs from 'fs-extra';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { ProcessSample } from '../../../shared/types';
import { Logger } from '../../utils/logger';
import { AlertSink } from '../alerts/AlertSink';
import { MetricRecorder } from '../metrics/MetricRecorder';
import { HealthProbe, HealthProbeOptions } from './HealthProbe';
import { SystemInspector } from './SystemInspector';

const SAMPLE: ProcessSample = { pid: 4242, memoryMb: 512.456, cpuPercent: 3.5 };

function fakeInspector(overrides: Partial<SystemInspector> = {}) {
    const base: SystemInspector = {
        findProcess: async () => SAMPLE,
        isPortListening: async () => true,
        diskUsagePercent: async () => 40,
        ...overrides
    };
    return {
        findProcess: vi.fn(base.findProcess),
        isPortListening: vi.fn(base.isPortListening),
        diskUsagePercent: vi.fn(base.diskUsagePercent)
    };
}

describe('HealthProbe', () => {
    const logger = new Logger({ quiet: true });
    let dir: string;
    let metrics: MetricRecorder;
    let alerts: AlertSink;

    const options: HealthProbeOptions = {
        processPattern: 'DayZServer',
        port: 2302,
        workDir: '/srv/dayz',
        intervalMs: 30000,
        maxMemoryMb: 1024,
        diskUsageThreshold: 90
    };

    const valueOf = async (key: string) => (await metrics.read())[key]?.value;

    beforeEach(async () => {
        dir = await fs.mkdtemp(path.join(os.tmpdir(), 'gamesup-health-'));
        metrics = new MetricRecorder(logger, { file: path.join(dir, 'metrics.json') });
        alerts = new AlertSink(logger);
    });

    afterEach(async () => {
        await fs.remove(dir);
    });

    it('short-circuits when the process is missing', async () => {
        const inspector = fakeInspector({ findProcess: async () => null });
        const notify = vi.spyOn(alerts, 'notify');
        const probe = new HealthProbe(options, { logger, metrics, alerts, inspector });

        const verdict = await probe.runCycle();

        expect(verdict).toMatchObject({
            processAlive: false,
            portListening: false,
            memoryMb: 0,
            exceededMemoryLimit: false,
            diskUsagePercent: null
        });
        expect(inspector.isPortListening).not.toHaveBeenCalled();
        expect(inspector.diskUsagePercent).not.toHaveBeenCalled();
        expect(notify).toHaveBeenCalledTimes(1);
        expect(notify).toHaveBeenCalledWith('Server process is not running!');
        expect(await valueOf('server_running')).toBe('0');
    });

    it('records a healthy cycle without alerting', async () => {
        const inspector = fakeInspector();
        const notify = vi.spyOn(alerts, 'notify');
        const probe = new HealthProbe(options, { logger, metrics, alerts, inspector });

        const verdict = await probe.runCycle();

        expect(verdict).toMatchObject({
            processAlive: true,
            portListening: true,
            memoryMb: 512.46,
            exceededMemoryLimit: false,
            diskUsagePercent: 40
        });
        expect(notify).not.toHaveBeenCalled();
        expect(inspector.isPortListening).toHaveBeenCalledWith(2302);
        expect(inspector.diskUsagePercent).toHaveBeenCalledWith('/srv/dayz');

        const snapshot = await metrics.read();
        expect(Object.fromEntries(Object.entries(snapshot).map(([k, v]) => [k, v.value]))).toEqual({
            server_running: '1',
            port_listening: '1',
            memory_usage: '512.46',
            cpu_usage: '3.5',
            disk_usage: '40'
        });
    });

    it('alerts on every failing check in one cycle', async () => {
        const inspector = fakeInspector({
            findProcess: async () => ({ pid: 1, memoryMb: 2048, cpuPercent: 99 }),
            isPortListening: async () => false,
            diskUsagePercent: async () => 95
        });
        const notify = vi.spyOn(alerts, 'notify');
        const probe = new HealthProbe(options, { logger, metrics, alerts, inspector });

        const verdict = await probe.runCycle();

        expect(verdict.exceededMemoryLimit).toBe(true);
        expect(notify).toHaveBeenCalledTimes(3);
        expect(notify).toHaveBeenCalledWith('Server port 2302 is not listening!');
        expect(notify).toHaveBeenCalledWith('Memory usage exceeded limit: 2048MB > 1024MB');
        expect(notify).toHaveBeenCalledWith('Disk usage critical: 95%');
        expect(await valueOf('port_listening')).toBe('0');
    });

    it('treats the thresholds as strict upper bounds', async () => {
        const inspector = fakeInspector({
            findProcess: async () => ({ pid: 1, memoryMb: 1024, cpuPercent: 0 }),
            diskUsagePercent: async () => 90
        });
        const notify = vi.spyOn(alerts, 'notify');
        const probe = new HealthProbe(options, { logger, metrics, alerts, inspector });

        const verdict = await probe.runCycle();

        expect(verdict.exceededMemoryLimit).toBe(false);
        expect(notify).not.toHaveBeenCalled();
    });

    it('has no memory ceiling when the limit is zero', async () => {
        const inspector = fakeInspector({ findProcess: async () => ({ pid: 1, memoryMb: 64000, cpuPercent: 0 }) });
        const notify = vi.spyOn(alerts, 'notify');
        const probe = new HealthProbe({ ...options, maxMemoryMb: 0 }, { logger, metrics, alerts, inspector });

        expect((await probe.runCycle()).exceededMemoryLimit).toBe(false);
        expect(notify).not.toHaveBeenCalled();
    });

    it('keeps the other checks when one of them fails', async () => {
        const inspector = fakeInspector({
            isPortListening: async () => false,
            diskUsagePercent: async () => { throw new Error('statfs failed'); }
        });
        const notify = vi.spyOn(alerts, 'notify');
        const probe = new HealthProbe(options, { logger, metrics, alerts, inspector });

        const verdict = await probe.runCycle();

        expect(verdict).toMatchObject({ processAlive: true, portListening: false, memoryMb: 512.46, diskUsagePercent: null });
        expect(notify).toHaveBeenCalledWith('Server port 2302 is not listening!');
    });

    it('treats a failed process lookup as a missing process', async () => {
        const inspector = fakeInspector({ findProcess: async () => { throw new Error('ps unavailable'); } });
        const notify = vi.spyOn(alerts, 'notify');
        const probe = new HealthProbe(options, { logger, metrics, alerts, inspector });

        expect((await probe.runCycle()).processAlive).toBe(false);
        expect(notify).toHaveBeenCalledWith('Server process is not running!');
    });

    it('sleeps between cycles until aborted', async () => {
        const inspector = fakeInspector();
        const controller = new AbortController();
        const delays: number[] = [];
        const sleep = async (ms: number) => {
            delays.push(ms);
            if (delays.length === 2) controller.abort();
        };
        const probe = new HealthProbe(options, { logger, metrics, alerts, inspector, sleep });

        await probe.run(controller.signal);

        expect(delays).toEqual([30000, 30000]);
        expect(inspector.findProcess).toHaveBeenCalledTimes(1);
    });

    it('checks before the first sleep in standalone mode', async () => {
        const inspector = fakeInspector();
        const controller = new AbortController();
        const sleep = async () => { controller.abort(); };
        const probe = new HealthProbe({ ...options, checkImmediately: true }, { logger, metrics, alerts, inspector, sleep });

        await probe.run(controller.signal);

        expect(inspector.findProcess).toHaveBeenCalledTimes(1);
    });
});
