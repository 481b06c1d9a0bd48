export interface HealthVerdict {
    processAlive: boolean;
    portListening: boolean;
    memoryMb: number;
    exceededMemoryLimit: boolean;
    diskUsagePercent: number | null;
    timestamp: string;
}

export interface ProcessSample {
    pid: number;
    memoryMb: number; // resident set size
    cpuPercent: number;
}
