// ============================================================================
// COMPRESSION MIDDLEWARE
// ============================================================================

import compression from "compression";
import type { Request, Response } from "express";

function shouldCompress(req: Request, res: Response): boolean {
  if (req.headers["x-no-compression"]) {
    return false;
  }
  return compression.filter(req, res);
}

/**
 * Gzip JSON responses above the threshold (bytes)
 */
export function compressionMiddleware(threshold = 1024) {
  return compression({
    filter: shouldCompress,
    level: 6,
    threshold,
  });
}
