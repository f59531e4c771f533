import { describe, it, expect, beforeEach } from 'vitest';
import { RateLimitedCaller, type CallPacingState, type RateLimitConfig } from '../services/rate-limited-caller.js';
import { FatalGenerationError, NoImageError, QuotaExceededError, TransientGenerationError } from '../utils/errors.js';
import { INTERVAL_JITTER_MS, MAX_INTERVAL_WAIT_MS } from '../constants.js';
import {
    createFakeProvider,
    createFakeTimer,
    imageResponse,
    quotaError,
    referenceImage,
    statusError,
    textOnlyResponse,
} from './fakes.js';

describe('RateLimitedCaller', () => {
    const payload = { referenceImages: [ referenceImage("a"), referenceImage("b") ], prompt: "scene prompt" };

    let fake: ReturnType<typeof createFakeProvider>;
    let timer: ReturnType<typeof createFakeTimer>;
    let state: CallPacingState;

    const createCaller = (config: RateLimitConfig = {}, random = () => 0) =>
        new RateLimitedCaller(fake.provider, "test-model", { ...config, state, now: timer.now, sleep: timer.sleep, random });

    beforeEach(() => {
        fake = createFakeProvider();
        timer = createFakeTimer(100_000);
        state = { lastCallAt: 0 };
    });

    it('should send reference images before the prompt and return the first inline image', async () => {
        fake.generateContent.mockResolvedValueOnce(imageResponse());

        const image = await createCaller().invoke(payload);

        expect(image.data.toString()).toBe("fake-png-bytes");
        expect(image.mimeType).toBe("image/png");
        expect(fake.generateContent).toHaveBeenCalledTimes(1);

        const params = fake.generateContent.mock.calls[ 0 ][ 0 ];
        expect(params.model).toBe("test-model");
        expect(params.contents).toEqual([
            { inlineData: { data: Buffer.from("a").toString("base64"), mimeType: "image/jpeg" } },
            { inlineData: { data: Buffer.from("b").toString("base64"), mimeType: "image/jpeg" } },
            { text: "scene prompt" },
        ]);
        expect(timer.sleep).not.toHaveBeenCalled();
        expect(state.lastCallAt).toBe(100_000);
    });

    describe('minimum interval', () => {
        it('should wait only the remaining interval when it is under the cap', async () => {
            state.lastCallAt = 100_000 - 4_000;
            fake.generateContent.mockResolvedValueOnce(imageResponse());

            await createCaller().invoke(payload);

            expect(timer.sleep).toHaveBeenCalledTimes(1);
            expect(timer.sleep).toHaveBeenCalledWith(1_100);
        });

        it('should not wait once the interval has passed', async () => {
            state.lastCallAt = 100_000 - 5_000;
            fake.generateContent.mockResolvedValueOnce(imageResponse());

            await createCaller().invoke(payload);

            expect(timer.sleep).not.toHaveBeenCalled();
        });

        it('should never wait longer than the cap plus jitter', async () => {
            for (const minIntervalMs of [ 6_000, 60_000, 600_000 ]) {
                timer.sleep.mockClear();
                state.lastCallAt = timer.now() - 10;
                fake.generateContent.mockResolvedValueOnce(imageResponse());

                await createCaller({ minIntervalMs }, () => 0.999).invoke(payload);

                expect(timer.sleep).toHaveBeenCalledTimes(1);
                const waited = timer.sleep.mock.calls[ 0 ][ 0 ];
                expect(waited).toBeGreaterThanOrEqual(MAX_INTERVAL_WAIT_MS);
                expect(waited).toBeLessThanOrEqual(MAX_INTERVAL_WAIT_MS + INTERVAL_JITTER_MS.max);
            }
        });

        it('should share the last call time between callers using the same state', async () => {
            fake.generateContent.mockResolvedValue(imageResponse());

            await createCaller().invoke(payload);
            await createCaller().invoke(payload);

            expect(timer.sleep).toHaveBeenCalledTimes(1);
            expect(timer.sleep).toHaveBeenCalledWith(3_100);
        });
    });

    describe('quota retries', () => {
        it('should retry once after the suggested delay and succeed', async () => {
            fake.generateContent
                .mockRejectedValueOnce(quotaError("2s"))
                .mockResolvedValueOnce(imageResponse());

            const image = await createCaller().invoke(payload);

            expect(image.data.toString()).toBe("fake-png-bytes");
            expect(fake.generateContent).toHaveBeenCalledTimes(2);
            // 2000ms retry delay + 200ms jitter, then the 2800ms left of the minimum interval + 100ms jitter
            expect(timer.sleep.mock.calls.map(([ ms ]) => ms)).toEqual([ 2_200, 2_900 ]);
        });

        it('should cap the suggested retry delay', async () => {
            fake.generateContent
                .mockRejectedValueOnce(quotaError("30s"))
                .mockResolvedValueOnce(imageResponse());

            await createCaller().invoke(payload);

            expect(timer.sleep.mock.calls.map(([ ms ]) => ms)).toEqual([ 6_200 ]);
        });

        it('should give up after one retry', async () => {
            fake.generateContent.mockRejectedValue(quotaError("1s"));

            await expect(createCaller().invoke(payload)).rejects.toBeInstanceOf(QuotaExceededError);
            expect(fake.generateContent).toHaveBeenCalledTimes(2);
        });

        it('should fail fast when the retry would pass the deadline', async () => {
            fake.generateContent.mockRejectedValue(quotaError());

            const invocation = createCaller().invoke(payload, { startedAt: 100_000 - 34_000 });

            await expect(invocation).rejects.toBeInstanceOf(QuotaExceededError);
            expect(fake.generateContent).toHaveBeenCalledTimes(1);
            expect(timer.sleep).not.toHaveBeenCalled();
        });

        it('should retry when the delay still fits in the deadline', async () => {
            fake.generateContent
                .mockRejectedValueOnce(quotaError())
                .mockResolvedValueOnce(imageResponse());

            await createCaller().invoke(payload, { startedAt: 100_000 - 29_000 });

            expect(fake.generateContent).toHaveBeenCalledTimes(2);
        });

        it('should not retry when the invocation disables retries', async () => {
            fake.generateContent.mockRejectedValue(quotaError("1s"));

            await expect(createCaller().invoke(payload, { maxRetries: 0 })).rejects.toBeInstanceOf(QuotaExceededError);
            expect(fake.generateContent).toHaveBeenCalledTimes(1);
        });
    });

    describe('non-quota failures', () => {
        it('should surface server errors as transient without retrying', async () => {
            fake.generateContent.mockRejectedValue(statusError("Internal error encountered.", 500));

            await expect(createCaller().invoke(payload)).rejects.toBeInstanceOf(TransientGenerationError);
            expect(fake.generateContent).toHaveBeenCalledTimes(1);
            expect(state.lastCallAt).toBe(100_000);
        });

        it('should surface rejected requests as fatal', async () => {
            fake.generateContent.mockRejectedValue(statusError("Request contains an invalid argument.", 400));

            await expect(createCaller().invoke(payload)).rejects.toBeInstanceOf(FatalGenerationError);
            expect(fake.generateContent).toHaveBeenCalledTimes(1);
        });

        it('should fail with NoImageError when only text comes back', async () => {
            fake.generateContent.mockResolvedValue(textOnlyResponse("I can't create that image."));

            const invocation = createCaller().invoke(payload);

            await expect(invocation).rejects.toBeInstanceOf(NoImageError);
            await expect(invocation).rejects.toThrow("generation produced no image");
            expect(fake.generateContent).toHaveBeenCalledTimes(1);
        });
    });
});
