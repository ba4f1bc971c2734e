import type { Request } from "express";

export function stringParam(value: unknown): string | undefined {
  if (typeof value !== "string") return undefined;
  const trimmed = value.trim();
  return trimmed ? trimmed : undefined;
}

export function queryString(req: Request, key: string): string | undefined {
  return stringParam(req.query[key]);
}

export function requiredParam(req: Request, key: string): string {
  return stringParam(req.params[key]) ?? "";
}

export function bodyRecord(req: Request): Record<string, unknown> {
  const body: unknown = req.body;
  if (typeof body !== "object" || body === null || Array.isArray(body)) {
    return {};
  }
  return Object.fromEntries(Object.entries(body));
}
