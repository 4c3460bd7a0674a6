import type { FastifyInstance } from "fastify";

export type RelayHealth = {
  accepting: boolean;
  queued: number;
  inflight: number;
};

export async function healthRoutes(
  app: FastifyInstance,
  opts: { service: string; health: () => RelayHealth }
) {
  app.get("/healthz", async () => ({
    ok: true,
    service: opts.service,
    ...opts.health(),
    ts: new Date().toISOString(),
  }));
}
