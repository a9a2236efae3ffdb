import type { FastifyInstance } from "fastify";
import {
  serializerCompiler,
  validatorCompiler,
  type ZodTypeProvider,
} from "fastify-type-provider-zod";
import type { PersistenceErrorKind } from "./errors.js";
import type { GameSession } from "./game.js";
import { HighScoreResponseSchema, InputBodySchema, LevelsResponseSchema } from "./schemas.js";

export interface RouteOptions {
  session: GameSession;
  onQuit: () => void;
}

const STATUS_BY_KIND: Record<PersistenceErrorKind, number> = {
  not_found: 404,
  malformed: 422,
  invalid: 422,
  io: 500,
};

export async function registerRoutes(app: FastifyInstance, { session, onQuit }: RouteOptions) {
  app.setValidatorCompiler(validatorCompiler);
  app.setSerializerCompiler(serializerCompiler);

  const typedApp = app.withTypeProvider<ZodTypeProvider>();

  app.get("/api/state", {
    schema: {
      description: "Current snapshot of the game, as the renderer sees it",
      tags: ["game"],
    },
  }, async () => {
    return session.snapshot();
  });

  typedApp.get("/api/levels", {
    schema: {
      description: "Score thresholds and tick rates of every level",
      tags: ["game"],
      response: { 200: LevelsResponseSchema },
    },
  }, async () => {
    return { levels: [...session.levels] };
  });

  typedApp.get("/api/highscore", {
    schema: {
      description: "Best score recorded so far",
      tags: ["game"],
      response: { 200: HighScoreResponseSchema },
    },
  }, async () => {
    return { highScore: session.snapshot().highScore };
  });

  // --- Input ---

  typedApp.post("/api/input", {
    schema: {
      description: "Deliver one input event (move, pause, restart, save, load, quit)",
      tags: ["input"],
      body: InputBodySchema,
    },
  }, async (request, reply) => {
    const outcome = session.handleInput(request.body.event);
    switch (outcome.kind) {
      case "quit":
        setImmediate(onQuit);
        return { status: "quitting" };
      case "saved":
      case "loaded":
        if (!outcome.result.ok) {
          return reply.status(STATUS_BY_KIND[outcome.result.error.kind]).send({ error: outcome.result.error.message });
        }
        return { status: outcome.kind, snapshot: session.snapshot() };
      case "handled":
        return { status: "ok", snapshot: session.snapshot() };
    }
  });

  // --- Save slot ---

  app.post("/api/save", {
    schema: {
      description: "Write the current game to the save slot, overwriting it",
      tags: ["persistence"],
    },
  }, async (_request, reply) => {
    const result = session.save();
    if (!result.ok) {
      return reply.status(STATUS_BY_KIND[result.error.kind]).send({ error: result.error.message });
    }
    return { status: "saved" };
  });

  app.post("/api/load", {
    schema: {
      description: "Replace the current game with the save slot. A bad slot leaves the game untouched.",
      tags: ["persistence"],
    },
  }, async (_request, reply) => {
    const result = session.load();
    if (!result.ok) {
      return reply.status(STATUS_BY_KIND[result.error.kind]).send({ error: result.error.message });
    }
    return { status: "loaded", snapshot: session.snapshot() };
  });
}
