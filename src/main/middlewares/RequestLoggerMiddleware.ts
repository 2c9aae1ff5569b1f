import type { NextFunction, Request, Response } from 'express';
import type { Logger } from 'pino';

export const requestLogger = (logger: Logger) => {
  const log = logger.child({ component: 'http' });

  return (req: Request, res: Response, next: NextFunction) => {
    const started = Date.now();
    res.on('finish', () => {
      const entry = {
        method: req.method,
        path: req.originalUrl,
        status: res.statusCode,
        durationMs: Date.now() - started,
      };
      if (res.statusCode >= 500) {
        log.error(entry, 'Request failed');
      } else {
        log.info(entry, 'Request completed');
      }
    });
    next();
  };
};
