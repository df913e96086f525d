import express, { type NextFunction, type Request, type Response } from "express";
import { createAppServices } from "./appServices";
import { loadSettings } from "./config/settings";
import { registerRoutes } from "./routes";
import { logError } from "./utils/errorHandler";

function requestLogger(req: Request, res: Response, next: NextFunction): void {
  const start = Date.now();
  res.on("finish", () => {
    if (req.path.startsWith("/api")) {
      console.log(`[express] ${req.method} ${req.path} ${res.statusCode} in ${Date.now() - start}ms`);
    }
  });
  next();
}

function main(): void {
  const settings = loadSettings();
  const services = createAppServices(settings);

  const app = express();
  app.use(express.json({ limit: settings.maxFileSize }));
  app.use(express.urlencoded({ extended: false }));
  app.use(requestLogger);

  const server = registerRoutes(app, services);
  server.listen(settings.port, "0.0.0.0", () => {
    console.log(
      `[express] serving on port ${settings.port} (llm: ${services.capabilities.llm}, embeddings: ${services.capabilities.embeddings})`,
    );
  });
}

try {
  main();
} catch (error) {
  logError("Startup", error);
  process.exit(1);
}
