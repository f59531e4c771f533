/**
 * Identity rules for PERSON A, the user shown in the uploaded selfies.
 */

export const buildReferenceInstruction = (referenceCount: number): string => {
  switch (referenceCount) {
    case 1:
      return "PERSON A (center): The same individual shown in the uploaded reference selfie.";
    case 2:
      return "PERSON A (center): The same individual shown in BOTH uploaded reference selfies.";
    case 3:
      return "PERSON A (center): The same individual shown in ALL THREE uploaded reference selfies.";
    default:
      return `PERSON A (center): The same individual shown in ALL ${referenceCount} uploaded reference selfies.`;
  }
};

export const IDENTITY_PRESERVATION_RULES = [
  "ULTRA-STRICT IDENTITY PRESERVATION: Keep PERSON A's face identity ABSOLUTELY IDENTICAL to the reference photo(s).",
  "If only one reference photo is provided, maintain the EXACT same face, head pose, gaze direction, facial expression,",
  "hair style, skin tone, and all facial features WITHOUT ANY MODIFICATIONS. Do not change anything about the person's appearance.",
  "If multiple references are provided, analyze ALL images comprehensively to extract the MOST CONSISTENT features.",
  "CRITICAL EYE PRESERVATION: Pay special attention to eye shape, eye color, eyelid structure, eyebrow shape and thickness,",
  "eye spacing, and gaze direction. Eyes must be IDENTICAL to the reference photo(s).",
  "Maintain EXACT facial features, bone structure, nose shape, mouth shape, jawline, and any distinctive characteristics.",
  "For clothing: Keep the same style, colors, and type of clothing shown in the reference photo(s).",
  "Do NOT change the outfit unless absolutely necessary for the scene context.",
].join(" ");

export const NO_TEXT_RULES =
  "ABSOLUTELY NO text overlays, timestamps, location names, or any written elements in the image. " +
  "No borders. Only one image in the result.";
