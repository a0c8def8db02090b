import { describe, it, expect } from 'vitest';
import request from 'supertest';
import express, { Router } from 'express';
import { InMemoryMetrics } from '../../metrics.js';
import { requestMetrics } from '../middleware/requestMetrics.js';

function buildApp(metrics: InMemoryMetrics) {
  const app = express();
  app.use(requestMetrics(metrics));

  const router = Router();
  router.get('/items/:id', (req, res) => {
    res.status(200).json({ id: req.params.id });
  });
  app.use('/api', router);

  return app;
}

// 'finish' fires on the server side; let it run before reading metrics
const settle = () => new Promise((resolve) => setTimeout(resolve, 10));

describe('requestMetrics', () => {
  it('should label matched requests with the route pattern', async () => {
    const metrics = new InMemoryMetrics();
    const app = buildApp(metrics);

    await request(app).get('/api/items/1');
    await request(app).get('/api/items/2');
    await settle();

    expect(metrics.snapshot().counters).toEqual({
      'http_requests_total{method="GET",route="/api/items/:id",status="200"}': 2,
    });
  });

  it('should fold unmatched paths into a single series', async () => {
    const metrics = new InMemoryMetrics();
    const app = buildApp(metrics);

    for (let i = 0; i < 20; i++) {
      await request(app).get(`/scan/${i}`);
    }
    await settle();

    const snapshot = metrics.snapshot();
    expect(snapshot.counters).toEqual({
      'http_requests_total{method="GET",route="unmatched",status="404"}': 20,
    });
    expect(Object.keys(snapshot.histograms)).toEqual([
      'http_request_duration_seconds{method="GET",route="unmatched",status="404"}',
    ]);
  });
});
