import { sanitizeMiddleware } from "@/middleware/sanitize";

import HealthController, { type HealthProbe } from "@/controllers/HealthController";
import TrackingController from "@/controllers/TrackingController";
import TripController from "@/controllers/TripController";
import type { TrackingEngine } from "@/services/tracking";
import { BAD_REQUEST, NOT_FOUND } from "@/utils";
import rateLimit from "express-rate-limit";
import { Logging } from "@/libs/Logging";
import compression from "compression";
import bodyParser from "body-parser";
import express, { NextFunction, Request, Response } from "express";
import config from "@/config";
import helmet from "helmet";
import cors from "cors";

const defaultrout = "/api/v1";

type ServerOptions = {
  health?: HealthProbe;
};

function isJsonParseError(err: unknown): boolean {
  if (typeof err !== "object" || err === null) return false;
  if ("type" in err && err.type === "entity.parse.failed") return true;
  return err instanceof SyntaxError && "body" in err;
}

export function createServer(engine: TrackingEngine, options: ServerOptions = {}) {
  const app = express();

  app.use(helmet());
  app.use(compression());
  app.use(cors(config.cors));
  app.use(rateLimit(config.limits));

  app.disable("x-powered-by");
  app.set("trust proxy", 1);
  app.use(bodyParser.json());
  app.use(bodyParser.urlencoded({ extended: true }));
  app.use((err: unknown, _req: Request, res: Response, next: NextFunction) => {
    if (isJsonParseError(err)) {
      return res.status(BAD_REQUEST).json({
        error: "INVALID_JSON",
        message: err instanceof Error ? err.message : "Malformed JSON body",
      });
    }
    return next(err);
  });

  app.use(sanitizeMiddleware({ allowDots: true }));
  app.use(Logging());

  app.use(defaultrout, new HealthController(engine, options.health).routes());
  app.use(defaultrout, new TripController(engine).routes());
  app.use(defaultrout, new TrackingController(engine).routes());

  app.use((_req: Request, res: Response) => {
    return res.status(NOT_FOUND).json({ error: "NOT_FOUND", message: "Route not found" });
  });

  return app;
}
