import Fastify, { type FastifyInstance } from "fastify";
import cors from "@fastify/cors";

import { env } from "./config/env";
import type { ReviewPolicy } from "./config/reviewPolicy";
import { closeMongo } from "./db/mongo";
import reviewRoutes from "./routes/reviews";

export interface BuildServerOptions {
  logger?: boolean;
  policy?: ReviewPolicy;
}

export async function buildServer(
  options: BuildServerOptions = {},
): Promise<FastifyInstance> {
  const app = Fastify({ logger: options.logger ?? env.NODE_ENV !== "test" });

  await app.register(cors, { origin: true });

  app.get("/healthz", async () => ({ ok: true }));

  await app.register(reviewRoutes, { policy: options.policy });

  app.addHook("onClose", async () => {
    await closeMongo();
  });

  return app;
}

async function bootstrap() {
  const app = await buildServer();
  const port = Number(env.PORT);
  try {
    await app.listen({ port, host: env.HOST });
    app.log.info(`[STARTUP] Server started on port ${port}`);
  } catch (err) {
    app.log.error(err, "[FATAL] Failed to start server");
    process.exit(1);
  }
}

if (require.main === module) {
  bootstrap().catch((err) => {
    console.error("[FATAL] Failed to start server", err);
    process.exit(1);
  });
}
