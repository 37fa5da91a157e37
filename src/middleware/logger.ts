import { Request, Response, NextFunction } from "express";

/**
 * Logs every request once the response is finished: method, path, status,
 * duration and client IP. The Authorization header is reported only as
 * present or absent.
 */
export const requestLogger = (
  req: Request,
  res: Response,
  next: NextFunction,
) => {
  const startTime = Date.now();
  const timestamp = new Date().toISOString();

  res.on("finish", () => {
    const duration = Date.now() - startTime;
    const auth = req.headers.authorization ? "token" : "anonymous";
    const ip = req.ip || req.socket.remoteAddress || "unknown";
    const line = `[${timestamp}] ${req.method} ${req.originalUrl} ${res.statusCode} ${duration}ms - ${auth} - IP: ${ip}`;

    if (res.statusCode >= 500) {
      console.error(line);
    } else if (res.statusCode >= 400) {
      console.warn(line);
    } else {
      console.log(line);
    }
  });

  next();
};
