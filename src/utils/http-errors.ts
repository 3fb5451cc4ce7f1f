import type { Response } from "express";
import { z } from "zod";
import { InputError, LocationNotFoundError, UpstreamError } from "../errors";

/**
 * Map a failure inside a route handler onto the JSON error contract.
 * Anything unrecognised is logged under the route's tag and answered with 500.
 */
export function sendRouteError(res: Response, error: unknown, tag: string, fallbackMessage: string) {
  if (error instanceof z.ZodError) {
    return res.status(400).json({ error: "Invalid request", details: error.issues });
  }
  if (error instanceof LocationNotFoundError) {
    return res.status(404).json({ error: error.message });
  }
  if (error instanceof InputError) {
    return res.status(400).json({ error: error.message });
  }
  if (error instanceof UpstreamError) {
    console.warn(`[${tag}] ${error.service} failed:`, error.message);
    return res.status(502).json({ error: error.message, details: { service: error.service } });
  }

  console.error(`[${tag}] Unexpected error:`, error);
  return res.status(500).json({
    error: error instanceof Error ? error.message : fallbackMessage,
  });
}
