import type { PromptBuilder, SceneJob } from "../types/index.js";
import type { CharacterProfile } from "./characters.js";
import {
  buildReferenceInstruction,
  IDENTITY_PRESERVATION_RULES,
  NO_TEXT_RULES,
} from "./identity-preservation-instruction.js";

export interface ShotPromptOptions {
  character: CharacterProfile;
  /** Ask for the real person rather than a look-alike, where the character has one. */
  useExactCharacter: boolean;
  referenceCount: number;
}

const buildBillGatesPrompt = (job: SceneJob, useExactCharacter: boolean, referenceInstruction: string): string => {
  const characterPhrase = useExactCharacter
    ? "Bill Gates"
    : "a Bill Gates look-alike (middle-aged Caucasian male with glasses)";

  return `Create a single photorealistic candid smartphone photo of two people.
${referenceInstruction} ${IDENTITY_PRESERVATION_RULES}
PERSON B: ${characterPhrase}.
Scene: ${job.description}.
Camera: Natural smartphone photo style, ~35mm equivalent, realistic lighting & shadows, proper hand/finger anatomy, casual appropriate outfits for the scene. Both people should look natural and candid.
${NO_TEXT_RULES}`;
};

const buildJokerPrompt = (job: SceneJob, referenceInstruction: string): string => {
  return `Create a single photorealistic candid smartphone photo of THREE people standing together.
${referenceInstruction} ${IDENTITY_PRESERVATION_RULES}
PERSON B (left): Joaquin Phoenix as Joker from the 2019 movie - distinctive red suit, green hair, white face paint with red smile, thin build, intense eyes, standing on the left side.
PERSON C (right): Heath Ledger as Joker from The Dark Knight - purple suit, messy green hair, white face paint with black around eyes and red Glasgow smile scars, standing on the right side.
POSE: All three people are standing close together with arms around each other's shoulders in a warm, friendly group pose. PERSON A is in the CENTER between the two Jokers, with one arm around each Joker's shoulder. The two Jokers also have their arms around PERSON A's shoulders, creating a tight group embrace.
Scene: ${job.description}.
Camera: Natural smartphone photo style, ~35mm equivalent, realistic lighting & shadows, proper hand/finger anatomy. All three people should look natural and friendly despite the Jokers' makeup.
${NO_TEXT_RULES}`;
};

/**
 * Builds the generation prompt for one shot. Pure: same input, same text.
 */
export const composeShotPrompt = (job: SceneJob, options: ShotPromptOptions): string => {
  const referenceInstruction = buildReferenceInstruction(options.referenceCount);

  switch (options.character.type) {
    case "billgates":
      return buildBillGatesPrompt(job, options.useExactCharacter, referenceInstruction);
    case "joker":
      return buildJokerPrompt(job, referenceInstruction);
  }
};

export interface PromptBuilders {
  primary: PromptBuilder;
  /** Look-alike variant, used when the primary prompt is rejected for a non-quota reason. */
  fallback?: PromptBuilder;
}

export function createPromptBuilders(character: CharacterProfile, useExactCharacter: boolean): PromptBuilders {
  const exact = useExactCharacter && character.hasLookAlike;

  const primary: PromptBuilder = (job, referenceCount) =>
    composeShotPrompt(job, { character, useExactCharacter: exact, referenceCount });

  if (!exact) {
    return { primary };
  }

  const fallback: PromptBuilder = (job, referenceCount) =>
    composeShotPrompt(job, { character, useExactCharacter: false, referenceCount });

  return { primary, fallback };
}
