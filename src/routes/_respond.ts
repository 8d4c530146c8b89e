// src/routes/_respond.ts
import type { Response } from "express";
import { errorMessage, isDomainError } from "../errors";

/**
 * Known domain errors → their status + code.
 * Anything else is logged and answered with a generic 500.
 */
export function sendError(res: Response, e: unknown, tag: string, fallbackCode: string) {
  if (isDomainError(e)) {
    return res.status(e.status).json({ error: e.code, message: e.message });
  }
  console.error(tag, errorMessage(e));
  return res.status(500).json({ error: fallbackCode });
}
