import path from 'path';
import si from 'systeminformation';
import { ProcessSample } from '../../../shared/types';
import { Logger } from '../../utils/logger';
import { NetUtils } from '../../utils/NetUtils';

export interface SystemInspector {
    findProcess(pattern: string): Promise<ProcessSample | null>;
    isPortListening(port: number): Promise<boolean>;
    diskUsagePercent(dir: string): Promise<number | null>;
}

/**
 * OS inspection backed by systeminformation.
 */
export class SystemInformationInspector implements SystemInspector {
    constructor(private readonly logger: Logger) {}

    async findProcess(pattern: string): Promise<ProcessSample | null> {
        const procs = await si.processes();
        const needle = pattern.toLowerCase();

        // Full command-line match, never our own process
        const matches = procs.list.filter(p =>
            p.pid !== process.pid &&
            `${p.name} ${p.command} ${p.params}`.toLowerCase().includes(needle)
        );
        if (matches.length === 0) return null;

        // Several hits (wrapper + server): the one holding the most memory is the server
        const target = matches.sort((a, b) => b.memRss - a.memRss)[0];
        return {
            pid: target.pid,
            memoryMb: target.memRss / 1024, // KB -> MB
            cpuPercent: target.cpu
        };
    }

    async isPortListening(port: number): Promise<boolean> {
        const bound = await NetUtils.isPortBound(port, this.logger);
        if (bound !== null) return bound;

        // No socket table (restricted container): fall back to a TCP probe
        return NetUtils.checkPort(port);
    }

    async diskUsagePercent(dir: string): Promise<number | null> {
        const volumes = await si.fsSize();
        const target = path.resolve(dir);

        // Longest mount point containing the directory
        let best: { mount: string; use: number } | null = null;
        for (const volume of volumes) {
            const mount = volume.mount;
            if (!mount) continue;
            const inside = target === mount || target.startsWith(mount.endsWith(path.sep) ? mount : mount + path.sep);
            if (inside && (!best || mount.length > best.mount.length)) {
                best = { mount, use: volume.use };
            }
        }
        return best ? Math.round(best.use) : null;
    }
}
