import type { NextFunction, Request, Response } from "express";
import { validationResult } from "express-validator";
import { TrackingError, errorMessage } from "@/utils/errors";
import {
  BAD_REQUEST,
  CONFLICT,
  INTERNAL_SERVER_ERROR,
  NOT_FOUND,
  SERVICE_UNAVAILABLE,
} from "@/utils/common/responseCodes";

export const checkReqDataError = (
  req: Request,
  res: Response,
  next: NextFunction,
) => {
  const errors = validationResult(req);
  if (!errors.isEmpty()) {
    return res
      .status(BAD_REQUEST)
      .json({ error: "VALIDATION_ERROR", errors: errors.array() });
  }
  next();
};

export function statusForError(error: unknown): number {
  if (!(error instanceof TrackingError)) {
    return INTERNAL_SERVER_ERROR;
  }

  switch (error.kind) {
    case "ValidationError":
      return BAD_REQUEST;
    case "InvalidStateError":
      return CONFLICT;
    case "NotFoundError":
      return NOT_FOUND;
    case "TransientComputeError":
      return SERVICE_UNAVAILABLE;
  }
}

export const sendError = (
  res: Response,
  error: unknown,
  context: Record<string, unknown> = {},
) => {
  const status = statusForError(error);
  if (error instanceof TrackingError) {
    return res.status(status).json({ error: error.code, message: error.message });
  }

  console.error("[http] unexpected error", { ...context, error: errorMessage(error) });
  return res
    .status(status)
    .json({ error: "INTERNAL_ERROR", message: "Unexpected server error" });
};
