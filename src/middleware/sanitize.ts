"use strict";
import type { NextFunction, Request, Response } from "express";
import { has } from "lodash";

const TEST_REGEX_WITHOUT_DOT = /^\$/;
const REPLACE_REGEX = /^\$|\./g;
const TEST_REGEX = /^\$|\./;

interface Options {
  replaceWith?: string;
  allowDots?: boolean;
  maxDepth?: number;
}

type Visit = (
  obj: Record<string, unknown>,
  val: unknown,
  key: string,
) => { shouldRecurse: boolean; key: string };

function isPlainObject(obj: unknown): obj is Record<string, unknown> {
  return typeof obj === "object" && obj !== null;
}

function getTestRegex(allowDots: boolean | undefined): RegExp {
  return allowDots ? TEST_REGEX_WITHOUT_DOT : TEST_REGEX;
}

function withEach(target: unknown, maxDepth: number, cb: Visit): void {
  (function act(obj: unknown, depth = 0) {
    if (depth > maxDepth) return;

    if (Array.isArray(obj)) {
      obj.forEach((item) => act(item, depth + 1));
    } else if (isPlainObject(obj)) {
      Object.keys(obj).forEach(function (key) {
        const val = obj[key];
        const resp = cb(obj, val, key);
        if (resp.shouldRecurse) {
          act(obj[resp.key || key], depth + 1);
        }
      });
    }
  })(target);
}

/**
 * Strips keys that start with `$` (and, unless `allowDots`, keys with a
 * dot) so request data cannot smuggle query operators into mongo filters.
 */
export function sanitize(target: unknown, options: Options = {}) {
  const regex = getTestRegex(options.allowDots);
  let isSanitized = false;
  let replaceWith: string | null = null;
  if (!regex.test(options.replaceWith || "") && options.replaceWith !== ".") {
    replaceWith = options.replaceWith || null;
  }

  withEach(target, options.maxDepth || 10, function (obj, val, key) {
    let shouldRecurse = true;
    if (regex.test(key)) {
      isSanitized = true;
      delete obj[key];
      if (replaceWith) {
        key = key.replace(REPLACE_REGEX, replaceWith);
        if (key !== "__proto__" && key !== "constructor" && key !== "prototype") {
          obj[key] = val;
        }
      } else {
        shouldRecurse = false;
      }
    }

    return {
      shouldRecurse,
      key,
    };
  });

  return {
    isSanitized,
    target,
  };
}

function sanitizeMiddleware(options: Options) {
  return function (req: Request, _res: Response, next: NextFunction) {
    (["body", "params", "query"] as const).forEach(function (key) {
      if (has(req, key)) {
        sanitize(req[key], options);
      }
    });
    next();
  };
}

export { sanitizeMiddleware };
