import express, { Request, Response } from 'express';
import { z } from 'zod';
import type { InventoryDataService } from '../services/chatbotData';
import { queryDocsRag, RagResponse } from '../services/ragClient';
import { logger } from '../utils/logger';
import { toValidationProblem } from '../utils/schemaError';

export type RagFallback = (query: string) => Promise<RagResponse>;

const optionalLimit = z.coerce.number().int('limit must be an integer.').positive('limit must be positive.').optional();

const partSearchSchema = z.object({
  q: z.string({ required_error: 'Query parameter "q" is required.' }).trim().min(1, 'Query parameter "q" is required.'),
  limit: optionalLimit,
});

const recentOrdersSchema = z.object({
  limit: optionalLimit,
});

const clientOrdersSchema = z.object({
  client: z
    .string({ required_error: 'Query parameter "client" is required.' })
    .trim()
    .min(1, 'Query parameter "client" is required.'),
  limit: optionalLimit,
});

const orderParamsSchema = z.object({
  docNum: z.coerce
    .number()
    .int('Order number must be an integer.')
    .positive('Order number must be positive.')
    .safe('Order number is out of range.'),
});

const summarySchema = z.object({
  warehouse: z.string().trim().min(1).optional(),
});

const lowStockSchema = z.object({
  threshold: z.coerce.number().int('threshold must be an integer.').min(0, 'threshold cannot be negative.').optional(),
});

const querySchema = z.object({
  text: z.string({ required_error: 'Message text is required.' }).trim().min(1, 'Message text is required.'),
});

type Handler = (req: Request, res: Response) => Promise<void>;

function withErrorBoundary(route: string, handler: Handler): Handler {
  return async (req, res) => {
    try {
      await handler(req, res);
    } catch (error) {
      logger.error(`chatbotRoutes ${route} error`, { err: logger.serializeError(error) });
      res.status(500).json({ error: 'Internal server error' });
    }
  };
}

/**
 * Read-only chatbot data API. Lookups never fail loudly: an unreachable
 * database shows up as empty results, except for /health.
 */
export function createChatbotRouter(service: InventoryDataService, askRag: RagFallback = queryDocsRag) {
  const router = express.Router();

  router.get(
    '/parts',
    withErrorBoundary('/parts', async (req, res) => {
      const parsed = partSearchSchema.safeParse(req.query);
      if (!parsed.success) {
        res.status(422).json(toValidationProblem(parsed.error));
        return;
      }
      const parts = await service.searchParts(parsed.data.q, parsed.data.limit);
      res.json({ parts });
    })
  );

  router.get(
    '/parts/status',
    withErrorBoundary('/parts/status', async (req, res) => {
      const parsed = partSearchSchema.safeParse(req.query);
      if (!parsed.success) {
        res.status(422).json(toValidationProblem(parsed.error));
        return;
      }
      const parts = await service.searchPartsForStatus(parsed.data.q, parsed.data.limit);
      res.json({ parts });
    })
  );

  router.get(
    '/orders/recent',
    withErrorBoundary('/orders/recent', async (req, res) => {
      const parsed = recentOrdersSchema.safeParse(req.query);
      if (!parsed.success) {
        res.status(422).json(toValidationProblem(parsed.error));
        return;
      }
      const orders = await service.getRecentOrders(parsed.data.limit);
      res.json({ orders });
    })
  );

  router.get(
    '/orders',
    withErrorBoundary('/orders', async (req, res) => {
      const parsed = clientOrdersSchema.safeParse(req.query);
      if (!parsed.success) {
        res.status(422).json(toValidationProblem(parsed.error));
        return;
      }
      const orders = await service.searchOrdersByClient(parsed.data.client, parsed.data.limit);
      res.json({ orders });
    })
  );

  router.get(
    '/orders/:docNum',
    withErrorBoundary('/orders/:docNum', async (req, res) => {
      const parsed = orderParamsSchema.safeParse(req.params);
      if (!parsed.success) {
        res.status(422).json(toValidationProblem(parsed.error));
        return;
      }
      const order = await service.getOrderData(parsed.data.docNum);
      if (!order) {
        res.status(404).json({ error: 'Order not found' });
        return;
      }
      res.json({ order });
    })
  );

  router.get(
    '/inventory/summary',
    withErrorBoundary('/inventory/summary', async (req, res) => {
      const parsed = summarySchema.safeParse(req.query);
      if (!parsed.success) {
        res.status(422).json(toValidationProblem(parsed.error));
        return;
      }
      const summary = await service.getInventorySummary(parsed.data.warehouse);
      res.json({ summary });
    })
  );

  router.get(
    '/inventory/low-stock',
    withErrorBoundary('/inventory/low-stock', async (req, res) => {
      const parsed = lowStockSchema.safeParse(req.query);
      if (!parsed.success) {
        res.status(422).json(toValidationProblem(parsed.error));
        return;
      }
      const items = await service.getLowStockItems(parsed.data.threshold);
      res.json({ items });
    })
  );

  router.get(
    '/stats',
    withErrorBoundary('/stats', async (_req, res) => {
      const stats = await service.getDatabaseStats();
      res.json({ stats });
    })
  );

  router.get(
    '/health',
    withErrorBoundary('/health', async (_req, res) => {
      const database = await service.testConnection();
      res.status(database ? 200 : 503).json({ database: database ? 'ok' : 'unreachable' });
    })
  );

  router.post(
    '/query',
    withErrorBoundary('/query', async (req, res) => {
      const parsed = querySchema.safeParse(req.body ?? {});
      if (!parsed.success) {
        res.status(422).json(toValidationProblem(parsed.error));
        return;
      }

      const answer = await service.processAutomaticQuery(parsed.data.text);
      if (answer !== null) {
        res.json({ source: 'database', answer });
        return;
      }

      const rag = await askRag(parsed.data.text);
      res.json({ source: 'rag', answer: rag.answer, citations: rag.citations });
    })
  );

  return router;
}
