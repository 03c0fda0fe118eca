import { InferenceFault } from './InferenceFault';
import { RetryPolicy, RetryState } from './RetryPolicy';

const policy = new RetryPolicy({ maxRetries: 2, baseDelayMs: 100, backoffFactor: 2, maxDelayMs: 300 });

const connection = new InferenceFault('connection', 'socket hang up');

function attempting(attempt: number): Extract<RetryState, { phase: 'attempting' }> {
    return { phase: 'attempting', attempt };
}

describe('RetryPolicy', () => {
    it('starts with the first attempt', () => {
        expect(policy.start()).toEqual({ phase: 'attempting', attempt: 1 });
    });

    it('backs off exponentially up to the cap', () => {
        expect([1, 2, 3, 4].map((retry) => policy.delayFor(retry))).toEqual([100, 200, 300, 300]);
    });

    it('retries transient faults while retries remain', () => {
        expect(policy.fail(attempting(1), connection, 10_000)).toEqual({
            phase: 'retrying',
            attempt: 1,
            delayMs: 100,
            fault: connection,
        });
        expect(policy.fail(attempting(2), connection, 10_000)).toMatchObject({ phase: 'retrying', delayMs: 200 });
    });

    it('moves from retrying to the next attempt', () => {
        const retrying = policy.fail(attempting(1), connection, 10_000);
        if (retrying.phase !== 'retrying') {
            throw new Error(`unexpected phase ${retrying.phase}`);
        }
        expect(policy.resume(retrying)).toEqual({ phase: 'attempting', attempt: 2 });
    });

    it('gives up as backend-unavailable once retries are used up', () => {
        expect(policy.fail(attempting(3), connection, 10_000)).toEqual({
            phase: 'failed',
            attempt: 3,
            failure: {
                kind: 'backend-unavailable',
                message: 'Inference server unreachable after 3 attempt(s): socket hang up',
                attempts: 3,
            },
        });
    });

    it('reports exhausted per-call timeouts as a timeout', () => {
        const state = policy.fail(attempting(3), new InferenceFault('timeout', 'slow'), 10_000);

        expect(state).toEqual({
            phase: 'failed',
            attempt: 3,
            failure: { kind: 'timeout', message: 'Inference server did not answer in time after 3 attempt(s)' },
        });
    });

    it('does not retry when the backoff would cross the deadline', () => {
        const state = policy.fail(attempting(1), connection, 100);

        expect(state).toEqual({
            phase: 'failed',
            attempt: 1,
            failure: { kind: 'timeout', message: 'Request deadline reached after 1 attempt(s): socket hang up' },
        });
    });

    it('never retries an error response from the server', () => {
        const fault = new InferenceFault('http', '500 model crashed', 500);

        expect(policy.fail(attempting(1), fault, 10_000)).toEqual({
            phase: 'failed',
            attempt: 1,
            failure: { kind: 'backend-error', status: 500, message: '500 model crashed' },
        });
    });

    it('maps the remaining fault kinds to terminal failures', () => {
        const cases: Array<[InferenceFault, RetryState]> = [
            [
                new InferenceFault('invalid-response', 'no text', 502),
                { phase: 'failed', attempt: 1, failure: { kind: 'backend-error', status: 502, message: 'no text' } },
            ],
            [
                new InferenceFault('aborted', 'gone'),
                { phase: 'failed', attempt: 1, failure: { kind: 'cancelled', message: 'gone' } },
            ],
            [
                new InferenceFault('deadline', 'late'),
                { phase: 'failed', attempt: 1, failure: { kind: 'timeout', message: 'late' } },
            ],
        ];

        for (const [fault, expected] of cases) {
            expect(policy.fail(attempting(1), fault, 10_000)).toEqual(expected);
        }
    });

    it('records success with the attempt it happened on', () => {
        expect(policy.succeed(attempting(2), 'Hello!')).toEqual({ phase: 'succeeded', attempt: 2, text: 'Hello!' });
    });
});
