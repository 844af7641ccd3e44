import type {
  AvailabilityRow,
  LowStockItem,
  LowStockRow,
  OrderRecord,
  OrderRow,
  PartAvailability,
  PartMatch,
  PartRow,
  PartStatus,
  StatusRow,
  WarehouseSummary,
  WarehouseSummaryRow,
} from './types';

// pg hands back numeric, bigint and aggregate columns as strings
export function toNumber(value: unknown, fallback = 0): number {
  const numeric = toNullableNumber(value);
  return numeric === null ? fallback : numeric;
}

export function toNullableNumber(value: unknown): number | null {
  if (value == null) {
    return null;
  }
  if (typeof value === 'number') {
    return Number.isFinite(value) ? value : null;
  }
  if (typeof value === 'bigint') {
    return Number(value);
  }
  if (typeof value === 'string' && value.trim().length > 0) {
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : null;
  }
  return null;
}

export function toIsoString(value: unknown): string | null {
  if (value == null) {
    return null;
  }
  if (value instanceof Date) {
    return Number.isNaN(value.getTime()) ? null : value.toISOString();
  }
  return String(value);
}

export function mapPartRow(row: PartRow): PartMatch {
  return {
    id: toNumber(row.id),
    itemName: row.ItemName ?? '',
    itemCode: row.ItemCode ?? '',
  };
}

export function mapAvailabilityRow(row: AvailabilityRow): PartAvailability {
  return {
    warehouse: row.warehouse ?? null,
    quantity: toNumber(row.quantity),
  };
}

export function mapStatusRow(row: StatusRow): PartStatus {
  return {
    commitStatus: toNullableNumber(row.commit_status),
    updatedAt: toIsoString(row.updated_at),
  };
}

export function mapOrderRow(row: OrderRow): OrderRecord {
  return {
    docNum: toNumber(row.DocNum),
    cardName: row.CardName ?? null,
    paidToDate: toNullableNumber(row.PaidToDate),
    invoicedToDate: toNullableNumber(row.OINVToDate),
    deliveredToDate: toNullableNumber(row.ODLNToDate),
  };
}

export function mapLowStockRow(row: LowStockRow): LowStockItem {
  return {
    ...mapPartRow(row),
    onHand: toNumber(row.OnHand),
    warehouse: row.DfltWH ?? null,
  };
}

export function mapWarehouseSummaryRow(row: WarehouseSummaryRow): WarehouseSummary {
  return {
    warehouse: row.warehouse ?? null,
    totalItems: toNumber(row.total_items),
    totalQuantity: toNumber(row.total_quantity),
    avgQuantity: toNumber(row.avg_quantity),
  };
}
