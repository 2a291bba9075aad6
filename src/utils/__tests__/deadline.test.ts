/**
 * Unit tests for the deadline helper
 */

import { describe, it, expect, vi, afterEach } from 'vitest';

vi.mock('../logger.js', () => ({
    logger: {
        debug: vi.fn(),
        info: vi.fn(),
        warn: vi.fn(),
        error: vi.fn()
    }
}));

import { withDeadline } from '../deadline.js';
import { logger } from '../logger.js';

describe('withDeadline', () => {
    afterEach(() => {
        vi.useRealTimers();
        vi.clearAllMocks();
    });

    it('should resolve with the work result', async () => {
        const onTimeout = vi.fn(() => new Error('late'));
        await expect(withDeadline(Promise.resolve(42), 1000, onTimeout)).resolves.toBe(42);
        expect(onTimeout).not.toHaveBeenCalled();
    });

    it('should pass work errors through', async () => {
        await expect(
            withDeadline(Promise.reject(new Error('boom')), 1000, () => new Error('late'))
        ).rejects.toThrow('boom');
        expect(logger.debug).not.toHaveBeenCalled();
    });

    it('should reject with the timeout error when the deadline passes', async () => {
        vi.useFakeTimers();
        let fail: (error: Error) => void = () => undefined;
        const work = new Promise<number>((_resolve, reject) => {
            fail = reject;
        });
        const onTimeout = vi.fn(() => new Error('statement timed out'));

        const result = withDeadline(work, 500, onTimeout);
        const assertion = expect(result).rejects.toThrow('statement timed out');
        await vi.advanceTimersByTimeAsync(500);
        await assertion;
        expect(onTimeout).toHaveBeenCalledTimes(1);

        fail(new Error('cancelled'));
        await vi.waitFor(() => {
            expect(logger.debug).toHaveBeenCalledWith('Work settled after its deadline', {
                module: 'QUERY',
                error: 'cancelled'
            });
        });
    });
});
