import Fastify, { type FastifyBaseLogger } from "fastify";
import fastifyStatic from "@fastify/static";
import fastifyCors from "@fastify/cors";
import fastifySwagger from "@fastify/swagger";
import fastifySwaggerUi from "@fastify/swagger-ui";
import { jsonSchemaTransform } from "fastify-type-provider-zod";
import { config } from "./config.js";
import type { GameSession } from "./game.js";
import { registerRoutes } from "./routes.js";

export interface AppOptions {
  session: GameSession;
  logger: FastifyBaseLogger;
  onQuit: () => void;
  publicDir?: string;
}

export async function buildApp({ session, logger, onQuit, publicDir = config.publicDir }: AppOptions) {
  const app = Fastify({ loggerInstance: logger });

  await app.register(fastifyCors, { origin: true });

  await app.register(fastifySwagger, {
    openapi: {
      info: {
        title: "Snake with Levels",
        description: "Single-player snake. The page renders frames pushed over socket.io; these routes drive and inspect the game.",
        version: "1.0.0",
      },
      tags: [
        { name: "game", description: "Game state" },
        { name: "input", description: "Player input" },
        { name: "persistence", description: "Save slot and high score" },
      ],
    },
    transform: jsonSchemaTransform,
  });

  await app.register(fastifySwaggerUi, {
    routePrefix: "/docs",
  });

  // Routes (must be registered before static files)
  await registerRoutes(app, { session, onQuit });

  await app.register(fastifyStatic, {
    root: publicDir,
    prefix: "/",
    wildcard: false,
  });

  return app;
}
