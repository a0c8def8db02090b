import type { RequestHandler } from 'express';
import type { Metrics } from '../../../application/ports.js';

// One series for every request no route handled (404s, rate-limited calls)
export const UNMATCHED_ROUTE = 'unmatched';

/**
 * Count requests and observe their duration, labelled by method and the
 * matched route pattern. Raw paths never become labels.
 */
export function requestMetrics(metrics: Metrics): RequestHandler {
  return (req, res, next) => {
    const start = performance.now();
    res.on('finish', () => {
      const route: unknown = req.route;
      const routePath =
        typeof route === 'object' && route !== null && 'path' in route && typeof route.path === 'string'
          ? `${req.baseUrl}${route.path}`
          : UNMATCHED_ROUTE;
      const labels = { method: req.method, route: routePath, status: String(res.statusCode) };
      metrics.increment('http_requests_total', labels);
      metrics.observe('http_request_duration_seconds', (performance.now() - start) / 1000, labels);
    });
    next();
  };
}
