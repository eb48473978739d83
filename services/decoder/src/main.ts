import cors from "cors";
import express from "express";
import type { ErrorRequestHandler, Request, Response } from "express";
import morgan from "morgan";
import multer from "multer";

import { loadSettings, resolveSettings } from "./config.js";
import type { Settings } from "./config.js";
import { ScanError } from "./errors.js";
import { scanRequestSchema } from "./schema.js";
import { ScanService } from "./service.js";
import type { HealthResponse, ScanApiResponse } from "./types.js";

export function createService(): ScanService {
  return new ScanService();
}

function statusOf(error: unknown): number | undefined {
  if (typeof error === "object" && error !== null && "status" in error && typeof error.status === "number") {
    return error.status;
  }
  return undefined;
}

function errorMessageFor(error: unknown): string {
  if (error instanceof multer.MulterError) {
    return error.code === "LIMIT_FILE_SIZE" ? "Image upload is too large" : error.message;
  }
  if (typeof error === "object" && error !== null && "type" in error) {
    if (error.type === "entity.parse.failed") {
      return "Malformed JSON body";
    }
    if (error.type === "entity.too.large") {
      return "Request body is too large";
    }
  }
  return error instanceof Error ? error.message : "Unknown error";
}

export function createApp(service: ScanService = createService(), settings: Settings = resolveSettings()) {
  const app = express();
  const upload = multer({
    storage: multer.memoryStorage(),
    limits: { fileSize: settings.maxUploadBytes, files: 1 },
  });

  app.use(cors());
  app.use(morgan(settings.requestLogFormat));
  app.use(express.json({ limit: settings.jsonLimit }));

  app.get("/health", (_req, res: Response<HealthResponse>) => {
    res.json({ status: "ok" });
  });

  app.post("/scan", upload.single("image"), async (req: Request, res: Response<ScanApiResponse>) => {
    try {
      if (req.file) {
        res.json(await service.scan({ bytes: req.file.buffer, mediaType: req.file.mimetype }));
        return;
      }

      const parsed = scanRequestSchema.safeParse(req.body);
      if (!parsed.success) {
        res.status(400).json({ error: parsed.error.issues[0].message });
        return;
      }

      res.json(await service.scan(parsed.data.image));
    } catch (error) {
      if (error instanceof ScanError) {
        res.status(error.status).json({ error: error.message });
        return;
      }
      console.error("scan failed", error);
      res.status(500).json({ error: error instanceof Error ? error.message : "Unknown error" });
    }
  });

  app.use(express.static(settings.publicDir));
  app.use("/sdk", express.static(settings.sdkDir));

  const handleError: ErrorRequestHandler = (error, _req, res, _next) => {
    const status = statusOf(error) ?? (error instanceof multer.MulterError ? 400 : 500);
    if (status >= 500) {
      console.error("request failed", error);
    }
    res.status(status).json({ error: errorMessageFor(error) });
  };
  app.use(handleError);

  return app;
}

if (import.meta.url === `file://${process.argv[1]}`) {
  const settings = loadSettings();
  const app = createApp(createService(), settings);
  app.listen(settings.port, () => {
    console.log(`Barcode scan service listening on http://localhost:${settings.port}`);
  });
}
