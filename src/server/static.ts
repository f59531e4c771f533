import path from "path";
import express, { type Express } from "express";
import { STATIC_ROUTE, UPLOAD_FILE_PREFIX } from "../shared/constants.js";

/**
 * Serves generated images. Temporary uploads share the directory
 * but are never handed out.
 *
 * The upload check runs on the decoded file name, the same name
 * express.static resolves on disk.
 */
export function serveStatic(app: Express, rootDir: string) {
  app.use(STATIC_ROUTE, (req, res, next) => {
    let requested: string;
    try {
      requested = decodeURIComponent(req.path);
    } catch {
      res.status(400).end();
      return;
    }

    if (path.posix.basename(requested).toLowerCase().startsWith(UPLOAD_FILE_PREFIX)) {
      res.status(404).end();
      return;
    }
    next();
  });
  app.use(STATIC_ROUTE, express.static(rootDir, { index: false }));
}
