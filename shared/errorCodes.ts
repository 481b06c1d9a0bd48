export const ERROR_CODES = {
    // Configuration
    E_CONFIG: { code: 'E_CONFIG', message: 'Invalid supervisor configuration.' },

    // Preflight
    E_BINARY_MISSING: { code: 'E_BINARY_MISSING', message: 'Server binary not found.' },
    E_BINARY_NOT_EXECUTABLE: { code: 'E_BINARY_NOT_EXECUTABLE', message: 'Server binary is not executable.' },
    E_CONFIG_MISSING: { code: 'E_CONFIG_MISSING', message: 'Server configuration file not found.' },

    // Backups
    E_BACKUP_EMPTY: { code: 'E_BACKUP_EMPTY', message: 'Nothing to back up.' },
    E_BACKUP_FAILED: { code: 'E_BACKUP_FAILED', message: 'Failed to create backup.' },
    E_BACKUP_CORRUPT: { code: 'E_BACKUP_CORRUPT', message: 'Backup file is corrupted.' },
    E_BACKUP_NOT_FOUND: { code: 'E_BACKUP_NOT_FOUND', message: 'Backup file not found.' },
    E_RESTORE_FAILED: { code: 'E_RESTORE_FAILED', message: 'Failed to restore backup.' },
    E_UPLOAD_FAILED: { code: 'E_UPLOAD_FAILED', message: 'Failed to upload backup.' },
} as const;

export type ErrorCode = keyof typeof ERROR_CODES;
