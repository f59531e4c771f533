import express, { type Express } from "express";
import { contextMiddleware } from "./middle/context-handler.js";
import { errorHandler, notFoundHandler } from "./middle/error-handler.js";
import { registerRoutes, type RouteDependencies } from "./routes.js";
import { serveStatic } from "./static.js";

export function createApp(deps: RouteDependencies): Express {
  const app = express();

  app.use(contextMiddleware);

  app.use((req, res, next) => {
    const start = Date.now();
    res.on("finish", () => {
      const duration = Date.now() - start;
      console.log(`${req.method} ${req.path} ${res.statusCode} in ${duration}ms`);
    });
    next();
  });

  app.use(express.urlencoded({ extended: false }));

  serveStatic(app, deps.imageStore.rootDir);
  registerRoutes(app, deps);

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
