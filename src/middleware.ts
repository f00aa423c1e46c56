import type { NextFunction, Request, RequestHandler, Response } from "express";

/**
 * Guard for routes that need the X-API-Key header. No key configured means
 * the routes are open.
 */
export function requireApiKey(apiKey?: string): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    if (!apiKey) {
      next();
      return;
    }
    const header = req.headers["x-api-key"];
    const provided = Array.isArray(header) ? header[0] : header;
    if (provided !== apiKey) {
      res.status(401).json({ error: "Invalid API key" });
      return;
    }
    next();
  };
}
