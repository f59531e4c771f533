import fs from "fs/promises";
import path from "path";
import { v4 as uuidv4 } from "uuid";
import { STATIC_ROUTE, UPLOAD_FILE_PREFIX } from "../constants.js";
import type { GeneratedImage } from "../types/index.js";
import { extractErrorMessage } from "../utils/errors.js";

const EXTENSIONS_BY_MIME_TYPE: Record<string, string> = {
  "image/png": ".png",
  "image/jpeg": ".jpg",
  "image/webp": ".webp",
};

const randomName = () => uuidv4().replace(/-/g, "");

/**
 * Flat directory that holds generated images and, for the length of one
 * request, the raw uploads. Served as-is under `/static`.
 */
export class ImageStore {
  readonly rootDir: string;
  private readonly urlPrefix: string;

  constructor(rootDir: string, urlPrefix: string = STATIC_ROUTE) {
    this.rootDir = path.resolve(rootDir);
    this.urlPrefix = urlPrefix;
  }

  async ensureRoot(): Promise<void> {
    await fs.mkdir(this.rootDir, { recursive: true });
  }

  /**
   * File name for a temporary upload inside `rootDir`.
   */
  uploadFileName(): string {
    return `${UPLOAD_FILE_PREFIX}${randomName()}`;
  }

  /**
   * Writes a generated image and returns the URL the browser can load it from.
   */
  async saveArtifact(image: GeneratedImage): Promise<string> {
    const extension = EXTENSIONS_BY_MIME_TYPE[ image.mimeType ] ?? ".png";
    const fileName = `${randomName()}${extension}`;
    await fs.writeFile(path.join(this.rootDir, fileName), image.data);
    return `${this.urlPrefix}/${fileName}`;
  }

  /**
   * Removes temporary uploads. Never throws: a failed removal is logged and
   * the remaining files are still attempted.
   */
  async discard(filePaths: readonly string[]): Promise<void> {
    const results = await Promise.allSettled(filePaths.map((filePath) => fs.rm(filePath, { force: true })));
    results.forEach((result, i) => {
      if (result.status === "rejected") {
        console.error({ filePath: filePaths[ i ], error: extractErrorMessage(result.reason) }, "Failed to remove temporary upload");
      }
    });
  }
}
