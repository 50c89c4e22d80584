import { closeSync, openSync, readFileSync, unlinkSync, writeSync } from 'node:fs';
import { z } from 'zod';
import { getLogger } from '../utils/logger.js';
import { StoreLockedError } from './errors.js';

const lockFileSchema = z.object({
    pid: z.number().int().positive(),
    acquiredAt: z.string(),
});

function errorCode(error: unknown): string | undefined {
    if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
        return error.code;
    }
    return undefined;
}

function isProcessAlive(pid: number): boolean {
    try {
        process.kill(pid, 0);
        return true;
    } catch (error) {
        // EPERM: the process exists but belongs to someone else
        return errorCode(error) === 'EPERM';
    }
}

function readHolder(lockPath: string): number | null {
    try {
        const parsed = lockFileSchema.safeParse(JSON.parse(readFileSync(lockPath, 'utf-8')));
        return parsed.success ? parsed.data.pid : null;
    } catch (error) {
        getLogger().debug({ lockPath, error }, 'Unreadable lock file');
        return null;
    }
}

/**
 * Exclusive, process-level lock on a store location, held as a file
 * created with O_EXCL. A lock left behind by a dead process is reclaimed.
 */
export class StoreLock {
    private held = false;

    constructor(
        private readonly lockPath: string,
        private readonly location: string
    ) {}

    acquire(): void {
        if (this.tryCreate()) return;

        const holder = readHolder(this.lockPath);
        if (holder === null || holder === process.pid || isProcessAlive(holder)) {
            throw new StoreLockedError(this.location, holder);
        }

        getLogger().warn({ lockPath: this.lockPath, holder }, 'Removing stale store lock');
        this.removeFile();

        if (!this.tryCreate()) {
            throw new StoreLockedError(this.location, readHolder(this.lockPath));
        }
    }

    release(): void {
        if (!this.held) return;
        this.held = false;

        if (readHolder(this.lockPath) !== process.pid) {
            getLogger().warn({ lockPath: this.lockPath }, 'Store lock no longer owned, leaving it in place');
            return;
        }
        this.removeFile();
    }

    private tryCreate(): boolean {
        let fd: number;
        try {
            fd = openSync(this.lockPath, 'wx');
        } catch (error) {
            if (errorCode(error) === 'EEXIST') return false;
            throw error;
        }

        try {
            writeSync(fd, JSON.stringify({ pid: process.pid, acquiredAt: new Date().toISOString() }));
        } finally {
            closeSync(fd);
        }

        this.held = true;
        getLogger().debug({ lockPath: this.lockPath }, 'Store lock acquired');
        return true;
    }

    private removeFile(): void {
        try {
            unlinkSync(this.lockPath);
        } catch (error) {
            if (errorCode(error) !== 'ENOENT') throw error;
        }
    }
}
