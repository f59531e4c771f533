// src/server/routes.ts
import type { Express, Request, Response, NextFunction } from "express";
import multer from "multer";
import { z } from "zod";
import { MAX_UPLOAD_FILE_SIZE, MAX_UPLOAD_FILES } from "../shared/constants.js";
import { CHARACTER_TYPES, getCharacterProfile, listCharacterProfiles } from "../shared/prompts/characters.js";
import type { GenerationRunner, UploadedSelfie } from "../shared/services/generation-service.js";
import type { ImageStore } from "../shared/services/image-store.js";
import { InputValidationError } from "../shared/utils/errors.js";
import { renderCharacterPage } from "./views/character-page.js";
import { renderHomePage } from "./views/home-page.js";
import { renderResultPage } from "./views/result-page.js";

export interface UploadLimits {
  fileSize: number;
  files: number;
}

export interface RouteDependencies {
  generationService: GenerationRunner;
  imageStore: ImageStore;
  imageModel: string;
  uploadLimits?: UploadLimits;
}

const defaultUploadLimits: UploadLimits = {
  fileSize: MAX_UPLOAD_FILE_SIZE,
  files: MAX_UPLOAD_FILES,
};

// Unchecked checkboxes are simply absent from the form body.
const GenerateFormSchema = z.object({
  character_type: z.enum(CHARACTER_TYPES),
  exact_character: z.string().optional()
    .transform((value) => value !== undefined && value !== "false" && value !== "off"),
});

export function registerRoutes(app: Express, deps: RouteDependencies): Express {
  const { generationService, imageStore, imageModel } = deps;
  const limits = deps.uploadLimits ?? defaultUploadLimits;

  const upload = multer({
    storage: multer.diskStorage({
      destination: imageStore.rootDir,
      filename: (_req, _file, cb) => cb(null, imageStore.uploadFileName()),
    }),
    limits,
  });

  app.get("/", (_req: Request, res: Response) => {
    res.type("html").send(renderHomePage());
  });

  for (const profile of listCharacterProfiles()) {
    app.get(`/${profile.type}`, (_req: Request, res: Response) => {
      res.type("html").send(renderCharacterPage(profile, imageModel));
    });
  }

  app.post("/generate", upload.array("selfies", limits.files), async (req: Request, res: Response, next: NextFunction) => {
    const files = Array.isArray(req.files) ? req.files : [];
    const uploads: UploadedSelfie[] = files.map((file) => ({ path: file.path }));

    try {
      const form = GenerateFormSchema.safeParse(req.body);
      if (!form.success) {
        await imageStore.discard(uploads.map((item) => item.path));
        throw new InputValidationError("Choose a character before generating.");
      }

      const character = form.data.character_type;
      console.log(`Received generate request: ${uploads.length} selfie(s) with ${getCharacterProfile(character).title}`);

      const outcome = await generationService.generate({
        uploads,
        character,
        exactCharacter: form.data.exact_character,
      });

      res.status(200).type("html").send(renderResultPage(outcome));
    } catch (error) {
      next(error);
    }
  });

  return app;
}
