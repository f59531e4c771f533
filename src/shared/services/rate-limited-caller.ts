import { Modality, type GenerateContentResponse, type Part } from "@google/genai";
import type { LlmProvider } from "../llm/provider-types.js";
import {
    INTERVAL_JITTER_MS,
    MAX_INTERVAL_WAIT_MS,
    MAX_RETRIES_PER_SHOT,
    MIN_INTERVAL_BETWEEN_CALLS_MS,
    PER_REQUEST_DEADLINE_MS,
    RETRY_DELAY_CAP_MS,
    RETRY_JITTER_MS,
} from "../constants.js";
import type { CallAttempt, GeneratedImage, GenerationPayload, ImageCaller, InvokeOptions } from "../types/index.js";
import { classifyGenerationError, NoImageError, QuotaExceededError } from "../utils/errors.js";
import { jitter, sleep as defaultSleep, type Clock, type RandomSource, type Sleep } from "../utils/timing.js";

/**
 * Completion time of the most recent upstream call.
 */
export interface CallPacingState {
    lastCallAt: number;
}

/**
 * Process-wide pacing state. Every request reads and writes it, so the spacing
 * guarantee holds across the whole process rather than per user.
 */
export const sharedCallPacing: CallPacingState = { lastCallAt: 0 };

export type RateLimitConfig = {
    minIntervalMs?: number;
    maxIntervalWaitMs?: number;
    maxRetries?: number;
    retryDelayCapMs?: number;
    deadlineMs?: number;
};

export interface RateLimitedCallerOptions extends RateLimitConfig {
    state?: CallPacingState;
    now?: Clock;
    sleep?: Sleep;
    random?: RandomSource;
}

const defaultRateLimitConfig: Required<RateLimitConfig> = {
    minIntervalMs: MIN_INTERVAL_BETWEEN_CALLS_MS,
    maxIntervalWaitMs: MAX_INTERVAL_WAIT_MS,
    maxRetries: MAX_RETRIES_PER_SHOT,
    retryDelayCapMs: RETRY_DELAY_CAP_MS,
    deadlineMs: PER_REQUEST_DEADLINE_MS,
};

export function buildImageContents(payload: GenerationPayload): Part[] {
    const referenceParts: Part[] = payload.referenceImages.map((image) => ({
        inlineData: {
            data: image.data.toString("base64"),
            mimeType: image.mimeType,
        },
    }));
    return [ ...referenceParts, { text: payload.prompt } ];
}

/**
 * Returns the first inline image of the first candidate.
 */
export function extractInlineImage(response: GenerateContentResponse): GeneratedImage {
    const parts = response.candidates?.[ 0 ]?.content?.parts ?? [];
    const inlineData = parts.find((part) => !!part.inlineData?.data)?.inlineData;
    if (!inlineData?.data) {
        throw new NoImageError();
    }
    return {
        data: Buffer.from(inlineData.data, "base64"),
        mimeType: inlineData.mimeType ?? "image/png",
    };
}

/**
 * Wraps the image model with minimum call spacing and a single bounded retry
 * on quota rejections. Every wait is capped, and retries are skipped once they
 * would push the call sequence past the per-request deadline.
 */
export class RateLimitedCaller implements ImageCaller {
    private readonly config: Required<RateLimitConfig>;
    private readonly state: CallPacingState;
    private readonly now: Clock;
    private readonly sleep: Sleep;
    private readonly random: RandomSource;

    constructor(
        private readonly provider: LlmProvider,
        private readonly model: string,
        options: RateLimitedCallerOptions = {},
    ) {
        const { state, now, sleep, random, ...config } = options;
        this.config = { ...defaultRateLimitConfig, ...config };
        this.state = state ?? sharedCallPacing;
        this.now = now ?? Date.now;
        this.sleep = sleep ?? defaultSleep;
        this.random = random ?? Math.random;
    }

    async invoke(payload: GenerationPayload, options: InvokeOptions = {}): Promise<GeneratedImage> {
        const startedAt = options.startedAt ?? this.now();
        const maxRetries = options.maxRetries ?? this.config.maxRetries;
        const contents = buildImageContents(payload);

        for (let attempt = 1; ; attempt++) {
            await this.waitForMinInterval();

            try {
                const response = await this.callOnce(contents, attempt);
                const image = extractInlineImage(response);
                this.logAttempt({ attempt, at: this.now(), outcome: "success" });
                return image;
            } catch (error) {
                const failure = classifyGenerationError(error);
                failure.attempts = attempt;
                this.logAttempt({ attempt, at: this.now(), outcome: failure.kind }, failure.message);

                if (!(failure instanceof QuotaExceededError) || attempt > maxRetries) {
                    throw failure;
                }

                const delayMs = Math.min(failure.retryDelayMs ?? this.config.minIntervalMs, this.config.retryDelayCapMs);
                const elapsedMs = this.now() - startedAt;
                if (elapsedMs + delayMs > this.config.deadlineMs) {
                    console.warn(`   ⏱️  Quota retry skipped: ${elapsedMs}ms elapsed + ${delayMs}ms delay exceeds the ${this.config.deadlineMs}ms deadline`);
                    throw failure;
                }

                console.log(`   Retrying after quota rejection in ${delayMs}ms...`);
                await this.sleep(delayMs + jitter(RETRY_JITTER_MS, this.random));
            }
        }
    }

    private async callOnce(contents: Part[], attempt: number): Promise<GenerateContentResponse> {
        console.log(`Calling image model ${this.model} (Attempt ${attempt})...`);
        try {
            return await this.provider.generateContent({
                model: this.model,
                contents,
                config: {
                    responseModalities: [ Modality.IMAGE ],
                },
            });
        } finally {
            this.state.lastCallAt = this.now();
        }
    }

    private async waitForMinInterval(): Promise<void> {
        const remaining = this.config.minIntervalMs - (this.now() - this.state.lastCallAt);
        if (remaining <= 0) return;

        const waitMs = Math.min(remaining, this.config.maxIntervalWaitMs) + jitter(INTERVAL_JITTER_MS, this.random);
        await this.sleep(waitMs);
    }

    private logAttempt(record: CallAttempt, error?: string): void {
        if (record.outcome === "success") {
            console.log({ callAttempt: record }, `   ✓ Image call succeeded`);
        } else {
            console.warn({ callAttempt: record, error }, `   ✗ Image call failed (${record.outcome})`);
        }
    }
}
