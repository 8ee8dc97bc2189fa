import { Hono } from 'hono';

const health = new Hono();

// GET /health
health.get('/', (c) => c.json({ status: 'ok' }));

export default health;
