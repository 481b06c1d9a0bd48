import AdmZip from 'adm-zip';

const BACKUP_NAME = /^backup-(\d{4})(\d{2})(\d{2})-(\d{2})(\d{2})(\d{2})(?:-(\d+))?\.zip$/;

export function formatBackupStamp(date: Date): string {
    const pad = (n: number) => String(n).padStart(2, '0');
    return `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}` +
        `-${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}`;
}

export function backupFilename(date: Date, suffix = 0): string {
    return `backup-${formatBackupStamp(date)}${suffix > 0 ? `-${suffix}` : ''}.zip`;
}

/** Creation time and same-second sequence encoded in a backup filename, or null for foreign files. */
export function parseBackupFilename(filename: string): { createdAt: Date; sequence: number } | null {
    const match = BACKUP_NAME.exec(filename);
    if (!match) return null;

    const [, y, mo, d, h, mi, s, seq] = match;
    const createdAt = new Date(Date.UTC(Number(y), Number(mo) - 1, Number(d), Number(h), Number(mi), Number(s)));
    if (isNaN(createdAt.getTime())) return null;
    return { createdAt, sequence: seq ? Number(seq) : 0 };
}

/**
 * Simple wildcard match: `*` spans any run of characters, everything else is literal.
 */
export function matchesPattern(name: string, pattern: string): boolean {
    const escaped = pattern.split('*').map(part => part.replace(/[.+?^${}()|[\]\\]/g, '\\$&')).join('.*');
    return new RegExp(`^${escaped}$`).test(name);
}

/** True when any segment of a relative path matches an exclude pattern. */
export function isExcluded(relativePath: string, patterns: string[]): boolean {
    const segments = relativePath.split(/[\\/]/).filter(Boolean);
    return segments.some(segment => patterns.some(pattern => matchesPattern(segment, pattern)));
}

/**
 * Reads every entry back and checks its CRC. Unreadable or empty archives fail.
 */
export async function verifyZipArchive(file: string): Promise<boolean> {
    try {
        const zip = new AdmZip(file);
        const entries = zip.getEntries();
        if (entries.length === 0) return false;

        for (const entry of entries) {
            if (entry.isDirectory) continue;
            entry.getData();
        }
        return true;
    } catch {
        return false;
    }
}
