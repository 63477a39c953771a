// Local upstreams for trying the balancer by hand: `npm run mock-backends`
import express, { type Express } from "express";

export const MOCK_BACKEND_PORTS = [9000, 9001, 9002];

export function createMockBackend(name: string): Express {
  const app = express();

  app.get("/health", (_req, res) => {
    res.status(200).send("OK");
  });

  app.get("/", (_req, res) => {
    res.status(200).send(`Hello from ${name}`);
  });

  // Simulate a slow upstream: /slow?ms=1500
  app.get("/slow", (req, res) => {
    const delay = Math.min(Number(req.query.ms) || 1000, 30000);
    setTimeout(() => res.status(200).send(`Slow hello from ${name}`), delay);
  });

  app.use((_req, res) => {
    res.status(404).send("Not Found");
  });

  return app;
}

if (require.main === module) {
  for (const port of MOCK_BACKEND_PORTS) {
    createMockBackend(`port ${port}`).listen(port, () => {
      console.log(`Mock upstream server running at http://localhost:${port}`);
    });
  }
}
