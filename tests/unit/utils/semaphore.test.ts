import { describe, it, expect } from 'vitest';
import { Semaphore } from '../../../src/utils/semaphore';

describe('Semaphore', () => {
    it('should reject a permit count below one', () => {
        expect(() => new Semaphore(0)).toThrow('Semaphore needs at least one permit, got 0');
    });

    it('should hand out permits until exhausted', async () => {
        const semaphore = new Semaphore(2);
        await semaphore.acquire();
        await semaphore.acquire();

        expect(semaphore.inUse).toBe(2);
        let third = false;
        void semaphore.acquire().then(() => {
            third = true;
        });
        await Promise.resolve();
        expect(third).toBe(false);
        expect(semaphore.pending).toBe(1);
    });

    it('should pass permits to waiters in FIFO order', async () => {
        const semaphore = new Semaphore(1);
        const release = await semaphore.acquire();
        const order: string[] = [];

        const first = semaphore.acquire().then(next => {
            order.push('first');
            next();
        });
        const second = semaphore.acquire().then(next => {
            order.push('second');
            next();
        });

        release();
        await Promise.all([first, second]);

        expect(order).toEqual(['first', 'second']);
        expect(semaphore.inUse).toBe(0);
    });

    it('should ignore a second release of the same permit', async () => {
        const semaphore = new Semaphore(1);
        const release = await semaphore.acquire();
        release();
        release();

        expect(semaphore.inUse).toBe(0);
        await semaphore.acquire();
        expect(semaphore.inUse).toBe(1);
    });

    it('should drop an aborted waiter without consuming a permit', async () => {
        const semaphore = new Semaphore(1);
        const release = await semaphore.acquire();
        const controller = new AbortController();

        const waiting = semaphore.acquire(controller.signal);
        controller.abort(new Error('cancelled'));

        await expect(waiting).rejects.toThrow('cancelled');
        expect(semaphore.pending).toBe(0);

        release();
        expect(semaphore.inUse).toBe(0);
    });

    it('should reject immediately for an already aborted signal', async () => {
        const semaphore = new Semaphore(1);
        const controller = new AbortController();
        controller.abort(new Error('cancelled'));

        await expect(semaphore.acquire(controller.signal)).rejects.toThrow('cancelled');
        expect(semaphore.inUse).toBe(0);
    });

    it('should release the permit when a task throws', async () => {
        const semaphore = new Semaphore(1);

        await expect(semaphore.run(async () => {
            throw new Error('task failed');
        })).rejects.toThrow('task failed');

        expect(semaphore.inUse).toBe(0);
        await expect(semaphore.run(async () => 'ok')).resolves.toBe('ok');
    });

    it('should never run more tasks than permits at once', async () => {
        const semaphore = new Semaphore(2);
        let running = 0;
        let peak = 0;

        await Promise.all(Array.from({ length: 6 }, () => semaphore.run(async () => {
            running++;
            peak = Math.max(peak, running);
            await new Promise(resolve => setTimeout(resolve, 5));
            running--;
        })));

        expect(peak).toBe(2);
    });
});
