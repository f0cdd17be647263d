import { Router } from "express";
import { z } from "zod";
import type {
  CreateSessionResponse,
  ListSessionsResponse,
  SessionDetailResponse,
  SubmitQueryResponse
} from "@taxograph/shared";
import { validate } from "../middleware/validator.js";
import { ensureRuntimeReady, getConversationStoreSingleton } from "../runtime/graphRuntime.js";
import type { ConversationStoreLike } from "../services/InMemoryConversationStore.js";
import type { QueryProcessorLike } from "../services/QueryProcessor.js";
import { ConfigurationError, ConversationNotFoundError, UpstreamServiceError } from "../utils/errors.js";
import { logger } from "../utils/logger.js";

const sessionParamsSchema = z.object({
  id: z.string().min(1)
});

const listSessionsQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(200).default(100)
});

const submitQueryBodySchema = z.object({
  query: z.string().trim().min(1).max(2000)
});

interface CreateSessionsRouterOptions {
  conversationStore?: ConversationStoreLike;
  getQueryProcessor?: () => Promise<QueryProcessorLike>;
}

export function createSessionsRouter(options: CreateSessionsRouterOptions = {}): Router {
  const conversationStore = options.conversationStore ?? getConversationStoreSingleton();
  const getQueryProcessor =
    options.getQueryProcessor ?? (async () => (await ensureRuntimeReady()).queryProcessor);

  const sessionsRouter = Router();

  sessionsRouter.post("/", (_req, res) => {
    const response: CreateSessionResponse = {
      session: conversationStore.createSession().snapshot()
    };
    res.status(201).json(response);
  });

  sessionsRouter.get(
    "/",
    validate({ query: listSessionsQuerySchema }),
    (req, res) => {
      const { limit } = req.query as unknown as z.infer<typeof listSessionsQuerySchema>;
      const response: ListSessionsResponse = {
        sessions: conversationStore.listSessions(limit).map((state) => state.snapshot())
      };
      res.json(response);
    }
  );

  sessionsRouter.get(
    "/:id",
    validate({ params: sessionParamsSchema }),
    (req, res) => {
      const state = conversationStore.getSession(req.params.id ?? "");
      if (!state) {
        return res.status(404).json({ error: "Session not found" });
      }

      const response: SessionDetailResponse = {
        session: state.snapshot(),
        history: state.getHistoryText()
      };
      return res.json(response);
    }
  );

  sessionsRouter.delete(
    "/:id",
    validate({ params: sessionParamsSchema }),
    (req, res) => {
      const deleted = conversationStore.deleteSession(req.params.id ?? "");
      if (!deleted) {
        return res.status(404).json({ error: "Session not found" });
      }

      return res.status(204).send();
    }
  );

  sessionsRouter.post(
    "/:id/queries",
    validate({
      params: sessionParamsSchema,
      body: submitQueryBodySchema
    }),
    async (req, res) => {
      const sessionId = req.params.id ?? "";
      const { query } = req.body as z.infer<typeof submitQueryBodySchema>;

      try {
        const queryProcessor = await getQueryProcessor();
        const response: SubmitQueryResponse = await conversationStore.runExclusive(
          sessionId,
          async (state) => ({
            sessionId,
            response: await queryProcessor.processQuery(query, state),
            phase: state.phase.kind
          })
        );
        return res.json(response);
      } catch (error) {
        if (error instanceof ConversationNotFoundError) {
          return res.status(404).json({ error: "Session not found" });
        }
        if (error instanceof UpstreamServiceError) {
          logger.error({ err: error, sessionId, service: error.service }, "Query processing failed upstream");
          return res.status(502).json({ error: `Upstream ${error.service} failure` });
        }
        if (error instanceof ConfigurationError) {
          logger.error({ err: error }, "Runtime misconfigured");
          return res.status(500).json({ error: "Service misconfigured" });
        }

        logger.error({ err: error, sessionId }, "Query processing failed");
        return res.status(500).json({ error: "Failed to process query" });
      }
    }
  );

  return sessionsRouter;
}

export const sessionsRouter = createSessionsRouter();
