import type { ErrorRequestHandler, Express, RequestHandler, Response } from "express";
import { createServer, type Server } from "http";
import path from "path";
import multer from "multer";
import { ingestRequestSchema, searchTranscriptSchema } from "@shared/schema";
import type { AppServices } from "./appServices";
import { UPLOAD_LIMITS } from "./config/constants";
import { publicSettings } from "./config/settings";
import { commonSchemas, validate } from "./middleware/validation";
import { NotFoundError, ValidationError, handleRouteError } from "./utils/errorHandler";

/**
 * Aborts when the client goes away before the response is written, so
 * in-flight model calls for an abandoned request are cancelled.
 */
export function requestSignal(res: Response): AbortSignal {
  const controller = new AbortController();
  // The request stream closes once its body is consumed; only the response
  // closing early means the client went away.
  res.on("close", () => {
    if (!res.writableFinished) controller.abort();
  });
  return controller.signal;
}

export function healthHandler(services: AppServices): RequestHandler {
  return (_req, res) => {
    res.json({ status: "ok", capabilities: services.capabilities });
  };
}

export function configHandler(services: AppServices): RequestHandler {
  return (_req, res) => {
    res.json(publicSettings(services.settings));
  };
}

export function ingestHandler(services: AppServices): RequestHandler {
  return async (req, res) => {
    try {
      const body = ingestRequestSchema.parse(req.body ?? {});
      const text = req.file ? req.file.buffer.toString("utf-8") : body.text;

      if (!text || text.trim().length === 0) {
        throw new ValidationError("Provide a transcript file or a non-empty text field");
      }

      const record = await services.pipeline.ingest(
        { text, ticker: body.ticker, period: body.period },
        requestSignal(res),
      );
      res.status(201).json(record);
    } catch (error) {
      handleRouteError(res, error, "Ingest");
    }
  };
}

export function getAnalysisHandler(services: AppServices): RequestHandler {
  return async (req, res) => {
    try {
      const record = await services.storage.getAnalysis(req.params.id);
      if (!record) {
        throw new NotFoundError("Analysis");
      }
      res.json(record);
    } catch (error) {
      handleRouteError(res, error, "Get analysis");
    }
  };
}

export function searchTranscriptHandler(services: AppServices): RequestHandler {
  return async (req, res) => {
    try {
      const { query, topK } = searchTranscriptSchema.parse(req.body ?? {});
      const results = await services.pipeline.searchTranscript(
        req.params.id,
        query,
        topK,
        requestSignal(res),
      );
      res.json({ id: req.params.id, query, results });
    } catch (error) {
      handleRouteError(res, error, "Transcript search");
    }
  };
}

export function listByTickerHandler(services: AppServices): RequestHandler {
  return async (req, res) => {
    try {
      const ticker = req.params.ticker.toUpperCase();
      const analyses = await services.storage.listAnalysesByTicker(ticker);
      res.json({ ticker, analyses });
    } catch (error) {
      handleRouteError(res, error, "Search by ticker");
    }
  };
}

export function createUpload(maxFileSize: number) {
  return multer({
    storage: multer.memoryStorage(),
    limits: { fileSize: maxFileSize },
    fileFilter: (_req, file, cb) => {
      const extension = path.extname(file.originalname).toLowerCase();
      if (UPLOAD_LIMITS.ALLOWED_EXTENSIONS.some(allowed => allowed === extension)) {
        cb(null, true);
      } else {
        cb(new ValidationError(`Unsupported file type "${extension}"; upload a .txt transcript`));
      }
    },
  });
}

/**
 * Errors forwarded with next(err): validation failures from the `validate`
 * middleware and upload errors from multer.
 */
export const apiErrorHandler: ErrorRequestHandler = (err, _req, res, _next) => {
  if (err instanceof multer.MulterError) {
    const status = err.code === "LIMIT_FILE_SIZE" ? 413 : 400;
    res.status(status).json({ error: err.message });
    return;
  }
  handleRouteError(res, err, "HTTP");
};

export function registerRoutes(app: Express, services: AppServices): Server {
  const upload = createUpload(services.settings.maxFileSize);

  app.get("/api/health", healthHandler(services));
  app.get("/api/config", configHandler(services));

  app.post("/api/ingest", upload.single("file"), ingestHandler(services));

  app.get("/api/analysis/:id",
    validate({ params: commonSchemas.analysisId }),
    getAnalysisHandler(services),
  );

  app.post("/api/analysis/:id/search",
    validate({ params: commonSchemas.analysisId }),
    searchTranscriptHandler(services),
  );

  app.get("/api/search/:ticker",
    validate({ params: commonSchemas.ticker }),
    listByTickerHandler(services),
  );

  app.use(apiErrorHandler);

  const httpServer = createServer(app);
  return httpServer;
}
