import type { QueryResult, QueryResultRow } from 'pg';

export interface DbClient {
  query<T extends QueryResultRow = QueryResultRow>(queryText: string, params?: unknown[]): Promise<QueryResult<T>>;
  release(err?: Error | boolean): void;
}

/** Anything that hands out a client per call; `pg.Pool` qualifies. */
export interface ConnectionFactory {
  connect(): Promise<DbClient>;
}

export interface QueryProcessor {
  /** Resolves to a reply, or null when the text is not a database query. */
  process(text: string): Promise<string | null>;
}

export interface PartMatch {
  id: number;
  itemName: string;
  itemCode: string;
}

export interface PartAvailability {
  warehouse: string | null;
  quantity: number;
}

export interface PartStatus {
  commitStatus: number | null;
  updatedAt: string | null;
}

export interface PartWithAvailability extends PartMatch {
  availability: PartAvailability[];
}

export interface PartWithStatus extends PartMatch {
  status: PartStatus | null;
}

export interface OrderRecord {
  docNum: number;
  cardName: string | null;
  paidToDate: number | null;
  invoicedToDate: number | null;
  deliveredToDate: number | null;
}

export interface LowStockItem extends PartMatch {
  onHand: number;
  warehouse: string | null;
}

export interface WarehouseSummary {
  warehouse: string | null;
  totalItems: number;
  totalQuantity: number;
  avgQuantity: number;
}

export interface InventoryTotals {
  totalItems: number;
  totalQuantity: number;
  avgQuantity: number;
}

export interface InventorySummary {
  warehouses: WarehouseSummary[];
  totalWarehouses: number;
  /** Only present when the summary spans every warehouse. */
  grandTotal?: InventoryTotals;
}

export interface DatabaseStats {
  totalParts: number;
  totalOrders: number;
  totalWarehouses: number;
  totalStockQuantity: number;
}

/** Returned in place of a mapping when the lookup failed. */
export type EmptyResult = Record<string, never>;

// Raw view rows, keyed by the column names the views expose

export interface PartRow extends QueryResultRow {
  id: number | string;
  ItemName: string | null;
  ItemCode: string | null;
}

export interface AvailabilityRow extends QueryResultRow {
  warehouse: string | null;
  quantity: number | string | null;
}

export interface StatusRow extends QueryResultRow {
  commit_status: number | string | null;
  updated_at: Date | string | null;
}

export interface OrderRow extends QueryResultRow {
  DocNum: number | string;
  CardName: string | null;
  PaidToDate: number | string | null;
  OINVToDate: number | string | null;
  ODLNToDate: number | string | null;
}

export interface LowStockRow extends PartRow {
  OnHand: number | string | null;
  DfltWH: string | null;
}

export interface WarehouseSummaryRow extends QueryResultRow {
  warehouse: string | null;
  total_items: number | string;
  total_quantity: number | string | null;
  avg_quantity: number | string | null;
}

export interface TotalRow extends QueryResultRow {
  total: number | string | null;
}
