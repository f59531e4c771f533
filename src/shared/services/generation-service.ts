import { getCharacterProfile, type CharacterType } from "../prompts/characters.js";
import { createPromptBuilders } from "../prompts/prompt-composer.js";
import type { ShotFailure } from "../types/index.js";
import { InputValidationError } from "../utils/errors.js";
import type { ImageStore } from "./image-store.js";
import type { ReferenceImageSource } from "./reference-image-loader.js";
import type { ShotOrchestrator } from "./shot-orchestrator.js";

export interface UploadedSelfie {
  /** Location of the temporary upload inside the image store. */
  path: string;
}

export interface GenerationRequest {
  uploads: readonly UploadedSelfie[];
  character: CharacterType;
  exactCharacter: boolean;
}

export interface GenerationOutcome {
  character: CharacterType;
  imageUrls: string[];
  failures: ShotFailure[];
}

export interface GenerationRunner {
  generate(request: GenerationRequest): Promise<GenerationOutcome>;
}

/**
 * One generate request end to end: selfies in, gallery URLs and per-scene
 * failures out. Temporary uploads are removed when this returns or throws.
 */
export class GenerationService implements GenerationRunner {
  constructor(
    private readonly orchestrator: ShotOrchestrator,
    private readonly imageStore: ImageStore,
    private readonly referenceLoader: ReferenceImageSource,
  ) { }

  async generate(request: GenerationRequest): Promise<GenerationOutcome> {
    const { uploads, character, exactCharacter } = request;

    try {
      if (uploads.length === 0) {
        throw new InputValidationError("Upload at least one selfie.");
      }

      const referenceImages = await Promise.all(uploads.map((upload) => this.referenceLoader.load(upload.path)));
      console.log({ character, references: referenceImages.length, exactCharacter }, "Starting shot batch");

      const profile = getCharacterProfile(character);
      const { primary, fallback } = createPromptBuilders(profile, exactCharacter);
      const { artifacts, failures } = await this.orchestrator.run(referenceImages, profile.scenes, primary, fallback);

      const imageUrls: string[] = [];
      for (const artifact of artifacts) {
        imageUrls.push(await this.imageStore.saveArtifact(artifact.image));
      }

      return { character, imageUrls, failures };
    } finally {
      await this.imageStore.discard(uploads.map((upload) => upload.path));
    }
  }
}
