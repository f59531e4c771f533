import type {
    BatchResult,
    GeneratedImage,
    ImageCaller,
    PromptBuilder,
    ReferenceImage,
    SceneJob,
} from "../types/index.js";
import { MAX_CALLS_PER_SHOT } from "../constants.js";
import { classifyGenerationError, QuotaExceededError } from "../utils/errors.js";
import type { Clock } from "../utils/timing.js";

/**
 * Runs a character's shot list serially against the image caller.
 *
 * Each job ends up in exactly one of `artifacts` or `failures`; a failing job
 * never stops the batch. Quota rejections are recorded as-is, other failures
 * get one attempt with the fallback prompt when one is supplied and the
 * primary invocation has not used up the per-shot call budget.
 */
export class ShotOrchestrator {
    constructor(
        private readonly caller: ImageCaller,
        private readonly now: Clock = Date.now,
    ) { }

    async run(
        referenceImages: readonly ReferenceImage[],
        jobs: readonly SceneJob[],
        promptBuilder: PromptBuilder,
        fallbackPromptBuilder?: PromptBuilder,
    ): Promise<BatchResult> {
        const startedAt = this.now();
        const result: BatchResult = { artifacts: [], failures: [] };

        for (const [ index, job ] of jobs.entries()) {
            console.log(`\n🎬 Shot ${index + 1}/${jobs.length}: ${job.label}`);

            const outcome = await this.runJob(referenceImages, job, startedAt, promptBuilder, fallbackPromptBuilder);
            if (outcome.ok) {
                result.artifacts.push({ label: job.label, image: outcome.image });
            } else {
                console.warn(`   ✗ Shot "${job.label}" failed: ${outcome.message}`);
                result.failures.push({ label: job.label, message: outcome.message });
            }
        }

        console.log(`Batch finished: ${result.artifacts.length} generated, ${result.failures.length} failed`);
        return result;
    }

    private async runJob(
        referenceImages: readonly ReferenceImage[],
        job: SceneJob,
        startedAt: number,
        promptBuilder: PromptBuilder,
        fallbackPromptBuilder?: PromptBuilder,
    ): Promise<{ ok: true; image: GeneratedImage; } | { ok: false; message: string; }> {
        const prompt = promptBuilder(job, referenceImages.length);

        try {
            const image = await this.caller.invoke({ referenceImages, prompt }, { startedAt });
            return { ok: true, image };
        } catch (primaryError) {
            const failure = classifyGenerationError(primaryError);

            if (failure instanceof QuotaExceededError || !fallbackPromptBuilder) {
                return { ok: false, message: failure.message };
            }
            if (failure.attempts >= MAX_CALLS_PER_SHOT) {
                console.warn(`   Skipping fallback for "${job.label}": ${failure.attempts} calls already made`);
                return { ok: false, message: failure.message };
            }

            console.log(`   🔄 Retrying "${job.label}" with fallback prompt after: ${failure.message}`);
            const fallbackPrompt = fallbackPromptBuilder(job, referenceImages.length);
            try {
                const image = await this.caller.invoke({ referenceImages, prompt: fallbackPrompt }, { startedAt, maxRetries: 0 });
                return { ok: true, image };
            } catch (fallbackError) {
                return { ok: false, message: classifyGenerationError(fallbackError).message };
            }
        }
    }
}
