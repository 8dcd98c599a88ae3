import { describe, expect, it } from 'vitest';
import { ResultStream } from '~/proxy_tester/result-stream';

describe('ResultStream', () => {
    it('should refuse a buffer without capacity', () => {
        expect(() => new ResultStream<number>(0)).toThrow(RangeError);
    });

    it('should deliver values in push order and end after close', async () => {
        const stream = new ResultStream<number>(10);

        await stream.push(1);
        await stream.push(2);
        stream.close();

        const received: number[] = [];

        for await (const value of stream) {
            received.push(value);
        }

        expect(received).toEqual([ 1, 2 ]);
        expect(stream.delivered).toBe(2);
    });

    it('should hand a value straight to a waiting reader', async () => {
        const stream = new ResultStream<string>(1);
        const read = stream.next();

        await expect(stream.push('a')).resolves.toBe(true);
        await expect(read).resolves.toEqual({ done: false, value: 'a' });
        expect(stream.buffered).toBe(0);
    });

    it('should end a waiting reader when closed', async () => {
        const stream = new ResultStream<string>(1);
        const read = stream.next();

        stream.close();

        await expect(read).resolves.toEqual({ done: true, value: undefined });
    });

    it('should make producers wait while the buffer is full', async () => {
        const stream = new ResultStream<number>(2);

        await stream.push(1);
        await stream.push(2);

        let accepted: boolean | undefined;
        const third = stream.push(3).then((r) => {
            accepted = r;
        });

        await Promise.resolve();
        expect(accepted).toBeUndefined();
        expect(stream.buffered).toBe(2);

        await expect(stream.next()).resolves.toEqual({ done: false, value: 1 });
        await third;

        expect(accepted).toBe(true);
        expect(stream.buffered).toBe(2);

        stream.close();

        const rest: number[] = [];

        for await (const value of stream) {
            rest.push(value);
        }

        expect(rest).toEqual([ 2, 3 ]);
    });

    it('should refuse pushes after close', async () => {
        const stream = new ResultStream<number>(1);

        stream.close();
        stream.close();

        await expect(stream.push(1)).resolves.toBe(false);
        expect(stream.isClosed).toBe(true);
    });

    it('should drop buffered values and release waiting producers on cancel', async () => {
        const stream = new ResultStream<number>(1);

        await stream.push(1);
        const waiting = stream.push(2);

        stream.cancel();

        await expect(waiting).resolves.toBe(false);
        await expect(stream.push(3)).resolves.toBe(false);
        await expect(stream.next()).resolves.toEqual({ done: true, value: undefined });
        expect(stream.isCancelled).toBe(true);
        expect(stream.signal.aborted).toBe(true);
        expect(stream.delivered).toBe(0);
    });

    it('should cancel when the consumer breaks out of the loop', async () => {
        const stream = new ResultStream<number>(5);

        await stream.push(1);
        await stream.push(2);

        for await (const value of stream) {
            expect(value).toBe(1);
            break;
        }

        expect(stream.isCancelled).toBe(true);
        await expect(stream.push(3)).resolves.toBe(false);
    });
});
