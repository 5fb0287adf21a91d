import type { RequestHandler } from 'express';

export function allowAnyOrigin(enabled: boolean): RequestHandler {
  return (_req, res, next) => {
    if (enabled) {
      res.setHeader('Access-Control-Allow-Origin', '*');
      res.setHeader('Access-Control-Allow-Methods', 'GET, OPTIONS');
      res.setHeader('Access-Control-Allow-Headers', 'Content-Type');
    }
    next();
  };
}
