import type { NextFunction, Request, Response } from "express";
import multer from "multer";
import { extractErrorMessage, InputValidationError } from "../../shared/utils/errors.js";
import { renderErrorPage } from "../views/error-page.js";

export function resolveErrorStatus(err: unknown): number {
    if (err instanceof InputValidationError) return err.status;
    if (err instanceof multer.MulterError) return err.code === "LIMIT_FILE_SIZE" ? 413 : 400;
    return 500;
}

export function notFoundHandler(_req: Request, res: Response) {
    res.status(404).type("html").send(renderErrorPage(404, "Page not found."));
}

export function errorHandler(err: unknown, req: Request, res: Response, next: NextFunction) {
    if (res.headersSent) {
        next(err);
        return;
    }

    const status = resolveErrorStatus(err);
    const message = extractErrorMessage(err);

    if (status >= 500) {
        console.error({ status, path: req.path, err }, `API Error: ${message}`);
    } else {
        console.warn({ status, path: req.path }, `Rejected request: ${message}`);
    }

    res.status(status).type("html").send(renderErrorPage(status, status >= 500 ? "Internal Server Error" : message));
}
