import AdmZip from 'adm-zip';
import fs from 'fs-extra';
import os from 'os';
import path from 'path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import {
    backupFilename,
    formatBackupStamp,
    isExcluded,
    matchesPattern,
    parseBackupFilename,
    verifyZipArchive
} from './archiveUtils';

const STAMP = new Date(Date.UTC(2024, 0, 5, 3, 4, 5));

describe('backup filenames', () => {
    it('formats the UTC timestamp', () => {
        expect(formatBackupStamp(STAMP)).toBe('20240105-030405');
        expect(backupFilename(STAMP)).toBe('backup-20240105-030405.zip');
        expect(backupFilename(STAMP, 2)).toBe('backup-20240105-030405-2.zip');
    });

    it('parses names it produced', () => {
        expect(parseBackupFilename('backup-20240105-030405-2.zip')).toEqual({ createdAt: STAMP, sequence: 2 });
        expect(parseBackupFilename('backup-20240105-030405.zip')).toEqual({ createdAt: STAMP, sequence: 0 });
    });

    it('ignores foreign files', () => {
        expect(parseBackupFilename('notes.txt')).toBeNull();
        expect(parseBackupFilename('backup-20240105-030405.zip.partial')).toBeNull();
        expect(parseBackupFilename('backup-20240105-030405.zip.uploaded')).toBeNull();
    });
});

describe('matchesPattern', () => {
    it('expands wildcards and keeps other characters literal', () => {
        expect(matchesPattern('@CF', '@*')).toBe(true);
        expect(matchesPattern('server.log', '*.log')).toBe(true);
        expect(matchesPattern('server.log.old', '*.log')).toBe(false);
        expect(matchesPattern('serverDZ.cfg', 'serverDZ.cfg')).toBe(true);
        expect(matchesPattern('serverDZxcfg', 'serverDZ.cfg')).toBe(false);
    });
});

describe('isExcluded', () => {
    it('matches any path segment', () => {
        expect(isExcluded('profiles/logs/crash.txt', ['logs'])).toBe(true);
        expect(isExcluded('mpmissions/dayz/storage.tmp', ['*.tmp'])).toBe(true);
        expect(isExcluded('profiles/settings.json', ['logs', '*.tmp'])).toBe(false);
    });
});

describe('verifyZipArchive', () => {
    let dir: string;

    beforeEach(async () => {
        dir = await fs.mkdtemp(path.join(os.tmpdir(), 'gamesup-zip-'));
    });

    afterEach(async () => {
        await fs.remove(dir);
    });

    it('accepts a readable archive', async () => {
        const file = path.join(dir, 'ok.zip');
        const zip = new AdmZip();
        zip.addFile('serverDZ.cfg', Buffer.from('hostname = "Test";'));
        zip.writeZip(file);

        expect(await verifyZipArchive(file)).toBe(true);
    });

    it('rejects garbage and missing files', async () => {
        const file = path.join(dir, 'broken.zip');
        await fs.writeFile(file, 'definitely not a zip archive');

        expect(await verifyZipArchive(file)).toBe(false);
        expect(await verifyZipArchive(path.join(dir, 'missing.zip'))).toBe(false);
    });
});
