import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { LockManager, formatLockRecord, parseLockRecord, withLock } from '../../src/lock/lock-manager';
import { LockError } from '../../src/shared/errors';

const ACQUIRED_AT = new Date('2026-01-17T08:00:00.000Z');

describe('lock records', () => {
    it('formats pid and timestamp on one line', () => {
        expect(formatLockRecord(4242, ACQUIRED_AT)).toBe('4242 2026-01-17T08:00:00.000Z\n');
    });

    it('parses what it formats', () => {
        const record = parseLockRecord('4242 2026-01-17T08:00:00.000Z\n', '/tmp/x.lock');
        expect(record).toEqual({ pid: 4242, acquiredAt: ACQUIRED_AT, path: '/tmp/x.lock' });
    });

    it('accepts a bare pid', () => {
        expect(parseLockRecord('77', '/tmp/x.lock')?.pid).toBe(77);
    });

    it('rejects garbage and pid 0', () => {
        expect(parseLockRecord('not a pid', '/tmp/x.lock')).toBeNull();
        expect(parseLockRecord('', '/tmp/x.lock')).toBeNull();
        expect(parseLockRecord('0', '/tmp/x.lock')).toBeNull();
    });
});

describe('LockManager', () => {
    let dir: string;
    let lockPath: string;

    beforeEach(async () => {
        dir = await fs.mkdtemp(path.join(os.tmpdir(), 'vault-transcriber-lock-'));
        lockPath = path.join(dir, 'nested', 'run.lock');
    });

    afterEach(async () => {
        await fs.rm(dir, { recursive: true, force: true });
    });

    const manager = (pid: number, alive: number[] = []) => new LockManager(lockPath, {
        pid,
        isProcessAlive: (candidate) => alive.includes(candidate),
        now: () => ACQUIRED_AT,
    });

    it('creates the lock file with its own pid', async () => {
        const lock = manager(100);

        expect(await lock.acquire()).toBe(true);
        expect(lock.isHeld).toBe(true);
        expect(await fs.readFile(lockPath, 'utf-8')).toBe('100 2026-01-17T08:00:00.000Z\n');
    });

    it('refuses while a live process holds the lock', async () => {
        await fs.mkdir(path.dirname(lockPath), { recursive: true });
        await fs.writeFile(lockPath, formatLockRecord(200, ACQUIRED_AT), 'utf-8');

        const lock = manager(100, [200]);

        expect(await lock.acquire()).toBe(false);
        expect(lock.isHeld).toBe(false);
        expect(await fs.readFile(lockPath, 'utf-8')).toBe('200 2026-01-17T08:00:00.000Z\n');
    });

    it('reclaims a lock left by a dead process', async () => {
        await fs.mkdir(path.dirname(lockPath), { recursive: true });
        await fs.writeFile(lockPath, formatLockRecord(200, ACQUIRED_AT), 'utf-8');

        const lock = manager(100, []);

        expect(await lock.acquire()).toBe(true);
        expect((await lock.readRecord())?.pid).toBe(100);
    });

    it('reclaims an unreadable lock record', async () => {
        await fs.mkdir(path.dirname(lockPath), { recursive: true });
        await fs.writeFile(lockPath, 'garbage', 'utf-8');

        expect(await manager(100).acquire()).toBe(true);
    });

    it('removes the file on release', async () => {
        const lock = manager(100);
        await lock.acquire();
        await lock.release();

        expect(lock.isHeld).toBe(false);
        expect(await lock.readRecord()).toBeNull();
    });

    it('leaves a lock taken over by another process in place', async () => {
        const lock = manager(100);
        await lock.acquire();
        await fs.writeFile(lockPath, formatLockRecord(300, ACQUIRED_AT), 'utf-8');

        await lock.release();

        expect((await lock.readRecord())?.pid).toBe(300);
    });
});

describe('withLock', () => {
    let dir: string;

    beforeEach(async () => {
        dir = await fs.mkdtemp(path.join(os.tmpdir(), 'vault-transcriber-lock-'));
    });

    afterEach(async () => {
        await fs.rm(dir, { recursive: true, force: true });
    });

    it('releases the lock after the callback', async () => {
        const lockPath = path.join(dir, 'run.lock');
        const lock = new LockManager(lockPath, { pid: 100 });

        const result = await withLock(lock, async () => {
            expect(lock.isHeld).toBe(true);
            return 'done';
        });

        expect(result).toBe('done');
        expect(await lock.readRecord()).toBeNull();
    });

    it('releases the lock when the callback throws', async () => {
        const lockPath = path.join(dir, 'run.lock');
        const lock = new LockManager(lockPath, { pid: 100 });

        await expect(withLock(lock, async () => {
            throw new Error('boom');
        })).rejects.toThrow('boom');
        expect(await lock.readRecord()).toBeNull();
    });

    it('throws LockError naming the holder', async () => {
        const lockPath = path.join(dir, 'run.lock');
        await fs.writeFile(lockPath, formatLockRecord(200, ACQUIRED_AT), 'utf-8');
        const lock = new LockManager(lockPath, { pid: 100, isProcessAlive: () => true });

        let caught: unknown;
        try {
            await withLock(lock, async () => 'never');
        } catch (error) {
            caught = error;
        }

        expect(caught).toBeInstanceOf(LockError);
        if (caught instanceof LockError) {
            expect(caught.holderPid).toBe(200);
            expect(caught.lockFile).toBe(lockPath);
        }
    });
});
