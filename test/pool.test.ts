import { assert, describe, test } from 'vitest';
import { CancelledError, TransportError, UnauthorizedError } from '../lib/errors.js';
import { Semaphore, runOrdered } from '../lib/pool.js';
import { sleep } from '../lib/util.js';

describe('Semaphore', () => {
    test('should release waiters in the order they queued', async () => {
        const semaphore = new Semaphore(1);
        const order: number[] = [];

        await semaphore.acquire();
        const waiters = [1, 2, 3].map(async (id) => {
            await semaphore.acquire();
            order.push(id);
            semaphore.release();
        });
        semaphore.release();
        await Promise.all(waiters);

        assert.deepEqual(order, [1, 2, 3]);
    });

    test('run should hold a permit for the duration of the task', async () => {
        const semaphore = new Semaphore(2);
        let active = 0;
        let peak = 0;
        const results = await Promise.all(
            [1, 2, 3, 4, 5].map((id) =>
                semaphore.run(async () => {
                    active++;
                    peak = Math.max(peak, active);
                    await sleep(2);
                    active--;
                    return id;
                }),
            ),
        );

        assert.deepEqual(results, [1, 2, 3, 4, 5]);
        assert.equal(peak, 2);
    });

    test('run should release the permit when the task throws', async () => {
        const semaphore = new Semaphore(1);
        const failure = semaphore.run(async () => {
            throw new TransportError('reset');
        });
        await failure.then(
            () => assert.fail('expected a rejection'),
            (error: unknown) => assert.instanceOf(error, TransportError),
        );
        assert.equal(await semaphore.run(async () => 'next'), 'next');
    });

    test('should reject fewer than one permit', () => {
        assert.throws(() => new Semaphore(0), RangeError);
    });
});

describe('runOrdered', () => {
    test.each([
        [1, 1],
        [7, 1],
        [7, 3],
        [20, 8],
        [5, 10],
    ])('should keep input order for %i tasks at concurrency %i', async (count, concurrency) => {
        const items = Array.from({ length: count }, (_, index) => index);
        const outcomes = await runOrdered(
            items,
            async (item) => {
                await sleep(Math.floor(Math.random() * 10));
                return item * 2;
            },
            { concurrency },
        );

        assert.deepEqual(
            outcomes,
            items.map((item) => ({ status: 'fulfilled', value: item * 2 })),
        );
    });

    test('should never run more tasks than the concurrency limit', async () => {
        let active = 0;
        let peak = 0;
        await runOrdered(
            Array.from({ length: 12 }, (_, index) => index),
            async () => {
                active++;
                peak = Math.max(peak, active);
                await sleep(2);
                active--;
            },
            { concurrency: 3 },
        );
        assert.equal(peak, 3);
    });

    test('should record a failing task without stopping its siblings', async () => {
        const failure = new TransportError('connection reset');
        const outcomes = await runOrdered(
            ['a', 'b', 'c', 'd', 'e'],
            async (item) => {
                if (item === 'c') {
                    throw failure;
                }
                return item.toUpperCase();
            },
            { concurrency: 2 },
        );

        assert.deepEqual(outcomes, [
            { status: 'fulfilled', value: 'A' },
            { status: 'fulfilled', value: 'B' },
            { status: 'rejected', error: failure },
            { status: 'fulfilled', value: 'D' },
            { status: 'fulfilled', value: 'E' },
        ]);
    });

    test('should fail unstarted tasks with the halting error', async () => {
        const denied = new UnauthorizedError('denied');
        const started: string[] = [];
        const outcomes = await runOrdered(
            ['a', 'b', 'c'],
            async (item) => {
                started.push(item);
                throw denied;
            },
            { concurrency: 1, haltOn: (error) => error instanceof UnauthorizedError },
        );

        assert.deepEqual(started, ['a']);
        assert.deepEqual(
            outcomes.map((outcome) => (outcome.status === 'rejected' ? outcome.error : undefined)),
            [denied, denied, denied],
        );
    });

    test('should cancel tasks that have not started when the signal aborts', async () => {
        const controller = new AbortController();
        const started: number[] = [];
        const outcomes = await runOrdered(
            [1, 2, 3],
            async (item) => {
                started.push(item);
                return item;
            },
            {
                concurrency: 1,
                signal: controller.signal,
                onProgress: () => controller.abort(),
            },
        );

        assert.deepEqual(started, [1]);
        assert.deepEqual(outcomes[0], { status: 'fulfilled', value: 1 });
        const rest = outcomes.slice(1);
        assert.isTrue(
            rest.every(
                (outcome) => outcome.status === 'rejected' && outcome.error instanceof CancelledError,
            ),
        );
    });

    test('should report progress once per task', async () => {
        const progress: Array<[number, number]> = [];
        await runOrdered([1, 2, 3], async (item) => item, {
            concurrency: 2,
            onProgress: (completed, total) => progress.push([completed, total]),
        });
        assert.deepEqual(progress, [
            [1, 3],
            [2, 3],
            [3, 3],
        ]);
    });

    test('should return an empty list for no items', async () => {
        assert.deepEqual(await runOrdered([], async () => 1, { concurrency: 4 }), []);
    });
});
