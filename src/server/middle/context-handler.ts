// src/server/middle/context-handler.ts
import type { NextFunction, Request, Response } from "express";
import { v4 as uuidv4 } from "uuid";
import { type LogContext, logContextStore } from "../../shared/logger/index.js";

export function contextMiddleware(req: Request, res: Response, next: NextFunction) {
    const header = req.headers[ "x-correlation-id" ];
    const correlationId = typeof header === "string" && header.length > 0 ? header : uuidv4();

    const context: LogContext = {
        correlationId,
        method: req.method,
        url: req.path,
    };

    res.setHeader("X-Correlation-ID", correlationId);
    logContextStore.run(context, () => {
        next();
    });
}
