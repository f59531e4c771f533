import sharp from "sharp";
import { REFERENCE_IMAGE_MAX_SIDE } from "../constants.js";
import type { ReferenceImage } from "../types/index.js";
import { InputValidationError } from "../utils/errors.js";

export interface ReferenceImageSource {
  load(filePath: string): Promise<ReferenceImage>;
}

/**
 * Decodes an uploaded selfie, applies its EXIF orientation and shrinks it so
 * the longest side is at most `maxSide`, to keep request size and token cost down.
 */
export class ReferenceImageLoader implements ReferenceImageSource {
  constructor(private readonly maxSide: number = REFERENCE_IMAGE_MAX_SIDE) { }

  async load(filePath: string): Promise<ReferenceImage> {
    try {
      const data = await sharp(filePath)
        .rotate()
        .resize({
          width: this.maxSide,
          height: this.maxSide,
          fit: "inside",
          withoutEnlargement: true,
        })
        .jpeg({ quality: 90 })
        .toBuffer();
      return { data, mimeType: "image/jpeg" };
    } catch (error) {
      console.warn({ filePath, error }, "Failed to decode uploaded image");
      throw new InputValidationError("Could not read one of the uploaded images. Please upload JPEG, PNG or WebP photos.", { cause: error });
    }
  }
}
