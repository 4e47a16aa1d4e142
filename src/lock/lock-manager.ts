/**
 * Vault lock
 *
 * A PID file that lets exactly one run mutate a vault at a time:
 *   12345 2026-01-17T08:00:00.000Z
 *
 * Acquisition is a single non-blocking attempt. A lock whose holder process
 * is gone (or whose record cannot be read) is stale: it is removed and
 * acquisition is retried once.
 */

import * as fs from 'fs/promises';
import * as path from 'path';
import { LockError, hasErrorCode } from '../shared/errors';

export interface LockRecord {
    pid: number;
    acquiredAt: Date;
    path: string;
}

export interface LockManagerOptions {
    /** Process id written into the lock (defaults to process.pid) */
    pid?: number;
    /** Liveness check for a holder pid */
    isProcessAlive?: (pid: number) => boolean;
    now?: () => Date;
}

/**
 * Signal 0 tests if a process exists. EPERM means it exists but belongs to
 * another user.
 */
export function isPidAlive(pid: number): boolean {
    try {
        process.kill(pid, 0);
        return true;
    } catch (error) {
        return hasErrorCode(error, 'EPERM');
    }
}

export function formatLockRecord(pid: number, acquiredAt: Date): string {
    return `${pid} ${acquiredAt.toISOString()}\n`;
}

export function parseLockRecord(content: string, lockPath: string): LockRecord | null {
    const match = content.trim().match(/^(\d+)(?:\s+(\S+))?$/);
    if (!match) return null;

    const pid = parseInt(match[1], 10);
    if (!Number.isSafeInteger(pid) || pid <= 0) return null;

    const acquiredAt = match[2] ? new Date(match[2]) : new Date(0);
    return { pid, acquiredAt, path: lockPath };
}

export class LockManager {
    private readonly pid: number;
    private readonly isProcessAlive: (pid: number) => boolean;
    private readonly now: () => Date;
    private held: LockRecord | null = null;

    constructor(public readonly lockPath: string, options: LockManagerOptions = {}) {
        this.pid = options.pid ?? process.pid;
        this.isProcessAlive = options.isProcessAlive ?? isPidAlive;
        this.now = options.now ?? (() => new Date());
    }

    get isHeld(): boolean {
        return this.held !== null;
    }

    /**
     * Read the current lock record, or null if there is no lock file
     * or it does not hold a valid record
     */
    async readRecord(): Promise<LockRecord | null> {
        try {
            const content = await fs.readFile(this.lockPath, 'utf-8');
            return parseLockRecord(content, this.lockPath);
        } catch (error) {
            if (hasErrorCode(error, 'ENOENT')) return null;
            throw error;
        }
    }

    /**
     * Try to take the lock. Returns false when a live process holds it.
     */
    async acquire(): Promise<boolean> {
        if (this.held) return true;

        await fs.mkdir(path.dirname(this.lockPath), { recursive: true });
        return this.tryCreate(true);
    }

    private async tryCreate(retryIfStale: boolean): Promise<boolean> {
        const acquiredAt = this.now();
        try {
            await fs.writeFile(this.lockPath, formatLockRecord(this.pid, acquiredAt), { encoding: 'utf-8', flag: 'wx' });
            this.held = { pid: this.pid, acquiredAt, path: this.lockPath };
            return true;
        } catch (error) {
            if (!hasErrorCode(error, 'EEXIST')) throw error;
        }

        const holder = await this.readRecord();
        if (holder && this.isProcessAlive(holder.pid)) {
            return false;
        }
        if (!retryIfStale) {
            return false;
        }

        // Stale: holder is gone or the record is unreadable
        await fs.rm(this.lockPath, { force: true });
        return this.tryCreate(false);
    }

    /**
     * Remove the lock file, but only while it still records this process
     */
    async release(): Promise<void> {
        if (!this.held) return;
        this.held = null;

        const current = await this.readRecord();
        if (current && current.pid === this.pid) {
            await fs.rm(this.lockPath, { force: true });
        }
    }
}

/**
 * Run fn while holding the vault lock; the lock is released on every exit path.
 * Throws LockError when another live process holds the lock.
 */
export async function withLock<T>(lock: LockManager, fn: () => Promise<T>): Promise<T> {
    if (!(await lock.acquire())) {
        const holder = await lock.readRecord();
        throw new LockError(lock.lockPath, holder?.pid ?? null);
    }

    try {
        return await fn();
    } finally {
        await lock.release();
    }
}
