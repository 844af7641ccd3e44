import { ChatbotDataConfig, getChatbotDataConfig } from '../../config';
import { logger } from '../../utils/logger';
import { AutomaticQueryService, ChatbotLookups } from './AutomaticQueryService';
import {
  mapAvailabilityRow,
  mapLowStockRow,
  mapOrderRow,
  mapPartRow,
  mapStatusRow,
  mapWarehouseSummaryRow,
  toNumber,
} from './rowMapping';
import type {
  AvailabilityRow,
  ConnectionFactory,
  DatabaseStats,
  DbClient,
  EmptyResult,
  InventorySummary,
  LowStockItem,
  LowStockRow,
  OrderRecord,
  OrderRow,
  PartAvailability,
  PartRow,
  PartStatus,
  PartWithAvailability,
  PartWithStatus,
  QueryProcessor,
  StatusRow,
  TotalRow,
  WarehouseSummaryRow,
} from './types';

export interface InventoryDataServiceOptions {
  config?: ChatbotDataConfig;
  queryProcessor?: QueryProcessor;
}

type LogMeta = Record<string, unknown>;

export function buildContainsPattern(term: string): string {
  return `%${term.trim()}%`;
}

/**
 * Read-only lookups over the inventory and sales order views.
 *
 * Each call takes its own client from the factory and always releases it.
 * Failures are logged and turned into an empty result ([] / null / {} / false)
 * so callers never see driver errors.
 */
export class InventoryDataService {
  private readonly connections: ConnectionFactory;
  private readonly config: ChatbotDataConfig;
  private readonly queryProcessor: QueryProcessor;

  constructor(connections: ConnectionFactory, options: InventoryDataServiceOptions = {}) {
    this.connections = connections;
    this.config = options.config ?? getChatbotDataConfig();
    this.queryProcessor = options.queryProcessor ?? new AutomaticQueryService(this.lookupsForProcessor());
  }

  normalizeLimit(value: number | undefined): number {
    if (value === undefined || !Number.isFinite(value)) {
      return this.config.defaultLimit;
    }
    const floored = Math.floor(value);
    if (floored <= 0) {
      return this.config.defaultLimit;
    }
    return Math.min(this.config.maxLimit, floored);
  }

  async searchParts(term: string, limit?: number): Promise<PartWithAvailability[]> {
    const rowLimit = this.normalizeLimit(limit);
    return this.guard('searchParts', [], { term, limit: rowLimit }, () => this.loadParts(term, rowLimit));
  }

  async searchPartsForStatus(term: string, limit?: number): Promise<PartWithStatus[]> {
    const rowLimit = this.normalizeLimit(limit);
    return this.guard('searchPartsForStatus', [], { term, limit: rowLimit }, () =>
      this.loadPartsWithStatus(term, rowLimit)
    );
  }

  async getOrderData(orderNumber: number): Promise<OrderRecord | null> {
    return this.guard('getOrderData', null, { orderNumber }, () => this.loadOrder(orderNumber));
  }

  async processAutomaticQuery(text: string): Promise<string | null> {
    return this.guard('processAutomaticQuery', null, { length: text.length }, () => this.queryProcessor.process(text));
  }

  async getInventorySummary(warehouse?: string): Promise<InventorySummary | EmptyResult> {
    const empty: EmptyResult = {};
    return this.withConnection<InventorySummary | EmptyResult>(
      'getInventorySummary',
      empty,
      { warehouse: warehouse ?? null },
      async (client) => {
        const select = `SELECT "DfltWH" AS warehouse,
                               COUNT(*) AS total_items,
                               SUM("OnHand") AS total_quantity,
                               AVG("OnHand") AS avg_quantity
                          FROM ${this.config.inventoryView}`;

        const result = warehouse
          ? await client.query<WarehouseSummaryRow>(
              `${select}
                WHERE "DfltWH" = $1
                GROUP BY "DfltWH"`,
              [warehouse]
            )
          : await client.query<WarehouseSummaryRow>(
              `${select}
                GROUP BY "DfltWH"
                ORDER BY "DfltWH"`
            );

        const warehouses = result.rows.map(mapWarehouseSummaryRow);
        const summary: InventorySummary = {
          warehouses,
          totalWarehouses: warehouses.length,
        };

        if (!warehouse) {
          const totalItems = warehouses.reduce((sum, w) => sum + w.totalItems, 0);
          const totalQuantity = warehouses.reduce((sum, w) => sum + w.totalQuantity, 0);
          summary.grandTotal = {
            totalItems,
            totalQuantity,
            avgQuantity: totalItems > 0 ? totalQuantity / totalItems : 0,
          };
        }

        return summary;
      }
    );
  }

  async getRecentOrders(limit?: number): Promise<OrderRecord[]> {
    const rowLimit = this.normalizeLimit(limit);
    return this.withConnection('getRecentOrders', [], { limit: rowLimit }, async (client) => {
      const result = await client.query<OrderRow>(
        `SELECT "DocNum", "CardName", "PaidToDate", "OINVToDate", "ODLNToDate"
           FROM ${this.config.ordersView}
          ORDER BY "DocNum" DESC
          LIMIT $1`,
        [rowLimit]
      );
      return result.rows.map(mapOrderRow);
    });
  }

  async searchOrdersByClient(clientName: string, limit?: number): Promise<OrderRecord[]> {
    const rowLimit = this.normalizeLimit(limit);
    return this.withConnection('searchOrdersByClient', [], { clientName, limit: rowLimit }, async (client) => {
      const result = await client.query<OrderRow>(
        `SELECT "DocNum", "CardName", "PaidToDate", "OINVToDate", "ODLNToDate"
           FROM ${this.config.ordersView}
          WHERE "CardName" ILIKE $1
          ORDER BY "DocNum" DESC
          LIMIT $2`,
        [buildContainsPattern(clientName), rowLimit]
      );
      return result.rows.map(mapOrderRow);
    });
  }

  // Pass `client` to run on a connection the caller already holds
  async getPartAvailability(partId: number, client?: DbClient): Promise<PartAvailability[]> {
    const run = async (db: DbClient) => {
      const result = await db.query<AvailabilityRow>(
        `SELECT "DfltWH" AS warehouse, "OnHand" AS quantity
           FROM ${this.config.inventoryView}
          WHERE id = $1`,
        [partId]
      );
      return result.rows.map(mapAvailabilityRow);
    };

    return client
      ? this.guard('getPartAvailability', [], { partId }, () => run(client))
      : this.withConnection('getPartAvailability', [], { partId }, run);
  }

  async getPartStatus(partId: number, client?: DbClient): Promise<PartStatus | null> {
    const run = async (db: DbClient) => {
      const result = await db.query<StatusRow>(
        `SELECT "IsCommited" AS commit_status, "Updated" AS updated_at
           FROM ${this.config.inventoryView}
          WHERE id = $1`,
        [partId]
      );
      const row = result.rows[0];
      return row ? mapStatusRow(row) : null;
    };

    return client
      ? this.guard('getPartStatus', null, { partId }, () => run(client))
      : this.withConnection('getPartStatus', null, { partId }, run);
  }

  async getLowStockItems(threshold: number = this.config.lowStockThreshold): Promise<LowStockItem[]> {
    return this.withConnection('getLowStockItems', [], { threshold }, async (client) => {
      const result = await client.query<LowStockRow>(
        `SELECT id, "ItemName", "ItemCode", "OnHand", "DfltWH"
           FROM ${this.config.inventoryView}
          WHERE "OnHand" <= $1 AND "OnHand" >= 0
          ORDER BY "OnHand" ASC`,
        [threshold]
      );
      return result.rows.map(mapLowStockRow);
    });
  }

  async getDatabaseStats(): Promise<DatabaseStats | EmptyResult> {
    const empty: EmptyResult = {};
    return this.withConnection<DatabaseStats | EmptyResult>('getDatabaseStats', empty, {}, async (client) => {
      const total = async (sql: string) => {
        const result = await client.query<TotalRow>(sql);
        return toNumber(result.rows[0]?.total);
      };

      return {
        totalParts: await total(`SELECT COUNT(*) AS total FROM ${this.config.inventoryView}`),
        totalOrders: await total(`SELECT COUNT(*) AS total FROM ${this.config.ordersView}`),
        totalWarehouses: await total(`SELECT COUNT(DISTINCT "DfltWH") AS total FROM ${this.config.inventoryView}`),
        totalStockQuantity: await total(
          `SELECT SUM("OnHand") AS total FROM ${this.config.inventoryView} WHERE "OnHand" > 0`
        ),
      };
    });
  }

  async testConnection(): Promise<boolean> {
    return this.withConnection('testConnection', false, {}, async (client) => {
      const result = await client.query('SELECT 1 AS ok');
      return result.rows.length > 0;
    });
  }

  // The chat processor reads through these so it can tell an outage from "not found"
  private lookupsForProcessor(): ChatbotLookups {
    return {
      searchParts: (term, limit) => this.loadParts(term, this.normalizeLimit(limit)),
      searchPartsForStatus: (term, limit) => this.loadPartsWithStatus(term, this.normalizeLimit(limit)),
      getOrderData: (orderNumber) => this.loadOrder(orderNumber),
    };
  }

  private loadParts(term: string, rowLimit: number): Promise<PartWithAvailability[]> {
    return this.connected(async (client) => {
      const result = await client.query<PartRow>(
        `SELECT id, "ItemName", "ItemCode"
           FROM ${this.config.inventoryView}
          WHERE "ItemName" ILIKE $1 OR "ItemCode" ILIKE $1
          ORDER BY "IsCommited" DESC
          LIMIT $2`,
        [buildContainsPattern(term), rowLimit]
      );

      const parts: PartWithAvailability[] = [];
      for (const row of result.rows) {
        const part = mapPartRow(row);
        parts.push({ ...part, availability: await this.getPartAvailability(part.id, client) });
      }
      return parts;
    });
  }

  private loadPartsWithStatus(term: string, rowLimit: number): Promise<PartWithStatus[]> {
    return this.connected(async (client) => {
      const result = await client.query<PartRow>(
        `SELECT id, "ItemName", "ItemCode"
           FROM ${this.config.inventoryView}
          WHERE "ItemName" ILIKE $1 OR "ItemCode" ILIKE $1
          LIMIT $2`,
        [buildContainsPattern(term), rowLimit]
      );

      const parts: PartWithStatus[] = [];
      for (const row of result.rows) {
        const part = mapPartRow(row);
        parts.push({ ...part, status: await this.getPartStatus(part.id, client) });
      }
      return parts;
    });
  }

  private loadOrder(orderNumber: number): Promise<OrderRecord | null> {
    return this.connected(async (client) => {
      const result = await client.query<OrderRow>(
        `SELECT "DocNum", "CardName", "PaidToDate", "OINVToDate", "ODLNToDate"
           FROM ${this.config.ordersView}
          WHERE "DocNum" = $1`,
        [orderNumber]
      );
      const row = result.rows[0];
      return row ? mapOrderRow(row) : null;
    });
  }

  private async guard<T>(operation: string, fallback: T, meta: LogMeta, run: () => Promise<T>): Promise<T> {
    try {
      return await run();
    } catch (error) {
      logger.error(`[chatbot-data] ${operation} failed`, { ...meta, err: logger.serializeError(error) });
      return fallback;
    }
  }

  private async withConnection<T>(
    operation: string,
    fallback: T,
    meta: LogMeta,
    run: (client: DbClient) => Promise<T>
  ): Promise<T> {
    return this.guard(operation, fallback, meta, () => this.connected(run));
  }

  private async connected<T>(run: (client: DbClient) => Promise<T>): Promise<T> {
    const client = await this.connections.connect();
    try {
      return await run(client);
    } finally {
      client.release();
    }
  }
}
