import type { Request, RequestHandler, Response } from "express";
import { Router } from "express";
import { z } from "zod";
import {
  MAX_SUBGRAPH_DEPTH,
  TAXONOMY_LABELS,
  type GraphIntegrityResponse,
  type GraphNeighborsResponse,
  type GraphNodeResponse,
  type GraphStatsResponse,
  type GraphSubgraphResponse,
  type TaxonomyGraphStore,
  type TaxonomyLabel
} from "@taxograph/shared";
import { TaxonomyGraphBuilder } from "../graph/TaxonomyGraphBuilder.js";
import { validate } from "../middleware/validator.js";
import { ensureRuntimeReady, getGraphStoreSingleton } from "../runtime/graphRuntime.js";
import { logger } from "../utils/logger.js";

const nodeParamsSchema = z.object({
  id: z.string().min(1)
});

const codeParamsSchema = z.object({
  hsnCode: z.string().regex(/^\d{8}$/)
});

const listNodesQuerySchema = z.object({
  label: z
    .string()
    .refine((value): value is TaxonomyLabel => TAXONOMY_LABELS.some((label) => label === value), {
      message: `label must be one of ${TAXONOMY_LABELS.join(", ")}`
    }),
  limit: z.coerce.number().int().min(1).max(1000).default(100)
});

const neighborsQuerySchema = z.object({
  direction: z.enum(["in", "out"]).default("out")
});

const subgraphQuerySchema = z.object({
  depth: z.coerce.number().int().min(0).max(MAX_SUBGRAPH_DEPTH).default(1)
});

const hierarchyQuerySchema = z.object({
  direction: z.enum(["up", "down"]).default("up")
});

interface CreateGraphRouterOptions {
  store?: TaxonomyGraphStore;
  ensureGraphReady?: () => Promise<void>;
}

export function createGraphRouter(options: CreateGraphRouterOptions = {}): Router {
  const store = options.store ?? getGraphStoreSingleton();
  const ensureGraphReady =
    options.ensureGraphReady ??
    (options.store
      ? () => store.connect()
      : async () => {
          await ensureRuntimeReady();
        });
  const builder = new TaxonomyGraphBuilder(store);
  const graphRouter = Router();

  const ensureStoreReady = async (res: Response): Promise<boolean> => {
    try {
      await ensureGraphReady();
      return true;
    } catch (error) {
      logger.error({ err: error }, "Graph store unavailable");
      res.status(503).json({ error: "Graph store unavailable" });
      return false;
    }
  };

  const withStore =
    (handler: (req: Request, res: Response) => Promise<void>): RequestHandler =>
    async (req, res, next) => {
      if (!(await ensureStoreReady(res))) {
        return;
      }

      try {
        await handler(req, res);
      } catch (error) {
        next(error);
      }
    };

  graphRouter.get(
    "/stats",
    withStore(async (_req, res) => {
      const response: GraphStatsResponse = await store.getStats();
      res.json(response);
    })
  );

  graphRouter.get(
    "/integrity",
    withStore(async (_req, res) => {
      const response: GraphIntegrityResponse = await builder.validateIntegrity();
      res.json(response);
    })
  );

  graphRouter.get(
    "/nodes",
    validate({ query: listNodesQuerySchema }),
    withStore(async (req, res) => {
      const { label, limit } = req.query as unknown as z.infer<typeof listNodesQuerySchema>;
      const nodes = await store.listNodes(label);

      res.setHeader("x-total-count", String(nodes.length));
      const response: GraphNeighborsResponse = { nodes: nodes.slice(0, limit) };
      res.json(response);
    })
  );

  graphRouter.get(
    "/nodes/:id",
    validate({ params: nodeParamsSchema }),
    withStore(async (req, res) => {
      const node = await store.getNode(req.params.id ?? "");
      if (!node) {
        res.status(404).json({ error: "Node not found" });
        return;
      }

      const response: GraphNodeResponse = { node };
      res.json(response);
    })
  );

  graphRouter.get(
    "/nodes/:id/neighbors",
    validate({ params: nodeParamsSchema, query: neighborsQuerySchema }),
    withStore(async (req, res) => {
      const nodeId = req.params.id ?? "";
      const { direction } = req.query as unknown as z.infer<typeof neighborsQuerySchema>;
      if (!(await store.getNode(nodeId))) {
        res.status(404).json({ error: "Node not found" });
        return;
      }

      const response: GraphNeighborsResponse = {
        nodes: await store.getNeighbors(nodeId, direction)
      };
      res.json(response);
    })
  );

  graphRouter.get(
    "/nodes/:id/subgraph",
    validate({ params: nodeParamsSchema, query: subgraphQuerySchema }),
    withStore(async (req, res) => {
      const nodeId = req.params.id ?? "";
      const { depth } = req.query as unknown as z.infer<typeof subgraphQuerySchema>;
      if (!(await store.getNode(nodeId))) {
        res.status(404).json({ error: "Node not found" });
        return;
      }

      const response: GraphSubgraphResponse = await store.getSubgraph(nodeId, depth);
      res.json(response);
    })
  );

  graphRouter.get(
    "/codes/:hsnCode/hierarchy",
    validate({ params: codeParamsSchema, query: hierarchyQuerySchema }),
    withStore(async (req, res) => {
      const hsnCode = req.params.hsnCode ?? "";
      const { direction } = req.query as unknown as z.infer<typeof hierarchyQuerySchema>;
      const response: GraphNeighborsResponse = {
        nodes: await builder.traverseHierarchy(hsnCode, direction)
      };
      res.json(response);
    })
  );

  return graphRouter;
}

export const graphRouter = createGraphRouter();
