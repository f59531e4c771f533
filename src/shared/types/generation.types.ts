// shared/types/generation.types.ts

/**
 * One entry of a character's fixed shot list.
 */
export interface SceneJob {
  readonly label: string;
  readonly description: string;
}

/**
 * A decoded, downsized selfie ready to be sent upstream as inline data.
 */
export interface ReferenceImage {
  data: Buffer;
  mimeType: string;
}

export interface GeneratedImage {
  data: Buffer;
  mimeType: string;
}

export interface GenerationPayload {
  referenceImages: readonly ReferenceImage[];
  prompt: string;
}

export interface InvokeOptions {
  /** Epoch millis at which the enclosing call sequence began; the deadline is measured from here. */
  startedAt?: number;
  /** Overrides the caller's retry cap for this invocation. */
  maxRetries?: number;
}

export type CallOutcome = "success" | "quota" | "transient" | "fatal";

export interface CallAttempt {
  attempt: number;
  at: number;
  outcome: CallOutcome;
}

export interface ImageCaller {
  invoke(payload: GenerationPayload, options?: InvokeOptions): Promise<GeneratedImage>;
}

export type PromptBuilder = (job: SceneJob, referenceCount: number) => string;

export interface ShotArtifact {
  label: string;
  image: GeneratedImage;
}

export interface ShotFailure {
  label: string;
  message: string;
}

/**
 * Every job lands in exactly one of the two lists, in job order.
 */
export interface BatchResult {
  artifacts: ShotArtifact[];
  failures: ShotFailure[];
}
