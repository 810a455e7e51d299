import Fastify, { type FastifyInstance } from "fastify";
import cors from "@fastify/cors";
import { registerRoutes } from "./api/routes.js";
import { type AppConfig, loadConfig } from "./config.js";

export const buildApp = async (config: AppConfig = loadConfig()): Promise<FastifyInstance> => {
  const app = Fastify({
    logger: config.logLevel === "silent" ? false : { level: config.logLevel },
  });

  await app.register(cors, {
    origin: config.corsOrigins,
    methods: ["GET", "POST", "OPTIONS"],
    allowedHeaders: ["Content-Type"],
    maxAge: 86400,
  });

  registerRoutes(app, { prefix: config.prefix, deckSeed: config.deckSeed });

  return app;
};
