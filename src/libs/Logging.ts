import type { NextFunction, Request, RequestHandler, Response } from "express";
import { randomUUID } from "crypto";
import mongoose from "mongoose";
import morgan from "morgan";
import Logs from "@/models/appConfig/Logs";
import { isProd } from "@/utils";
import { errorMessage } from "@/utils/errors";

const REDACT_KEYS = ["password", "authorization", "token", "cookie", "set-cookie"];

export function redact(value: unknown, keys: string[] = REDACT_KEYS): unknown {
  if (Array.isArray(value)) {
    return value.map((item) => redact(item, keys));
  }
  if (!value || typeof value !== "object") {
    return value;
  }

  const clone: Record<string, unknown> = {};
  for (const [key, entry] of Object.entries(value)) {
    clone[key] = keys.includes(key.toLowerCase()) ? "[REDACTED]" : redact(entry, keys);
  }
  return clone;
}

const safeBody = (body: unknown): unknown => {
  try {
    const serialized = JSON.stringify(body);
    return serialized === undefined ? undefined : JSON.parse(serialized);
  } catch {
    return "[unserializable]";
  }
};

function readField(source: unknown, key: string): string | null {
  if (!source || typeof source !== "object" || !(key in source)) return null;
  const value: unknown = Reflect.get(source, key);
  return typeof value === "string" ? value : null;
}

async function persistFailedRequest(payload: Record<string, unknown>): Promise<void> {
  // without a database the record goes to the console
  if (mongoose.connection.readyState !== 1) {
    console.warn("[http] request failed", payload);
    return;
  }

  try {
    await Logs.create([payload]);
  } catch (error) {
    console.warn("[http] failed to persist request log", { error: errorMessage(error) });
  }
}

function requestLogger(): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    const requestId = randomUUID();
    res.locals.requestId = requestId;
    res.setHeader("X-Request-Id", requestId);

    const startHr = process.hrtime.bigint();
    const cpuStart = process.cpuUsage();
    const memStart = process.memoryUsage();

    const start = {
      requestId,
      method: req.method,
      url: req.originalUrl || req.url,
      origin: req.get("origin"),
      req_ip: req.ip,
      cpuUsageStartUser: cpuStart.user,
      cpuUsageStartSystem: cpuStart.system,
      memoryHeapUsedStart: memStart.heapUsed,
      memoryRssStart: memStart.rss,
      data: redact(safeBody(req.body)),
      query: redact(safeBody(req.query)),
      param: redact(safeBody(req.params)),
      headers: redact({ ...req.headers }),
      startAt: new Date(),
    };

    let responseBody: unknown;
    if (req.method !== "GET") {
      const originalJson = res.json.bind(res);
      res.json = (body?: unknown) => {
        responseBody = body;
        return originalJson(body);
      };
    }

    res.on("finish", () => {
      if (res.statusCode < 400) return;

      const cpuEnd = process.cpuUsage(cpuStart);
      const memEnd = process.memoryUsage();
      void persistFailedRequest({
        ...start,
        timeTaken: Number(process.hrtime.bigint() - startHr) / 1e6,
        cpuUsageEndUser: cpuEnd.user,
        cpuUsageEndSystem: cpuEnd.system,
        memoryHeapUsedEnd: memEnd.heapUsed,
        memoryRssEnd: memEnd.rss,
        responseCode: res.statusCode,
        trip_id:
          readField(req.params, "tripId") ??
          readField(req.body, "tripId") ??
          readField(req.query, "tripId"),
        error_code: readField(responseBody, "error"),
        responseData: responseBody === undefined ? undefined : safeBody(responseBody),
        endAt: new Date(),
      });
    });

    next();
  };
}

export function Logging(): RequestHandler {
  return isProd ? requestLogger() : morgan("dev");
}
