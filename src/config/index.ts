export interface ChatbotDataConfig {
  defaultLimit: number;
  maxLimit: number;
  lowStockThreshold: number;
  inventoryView: string;
  ordersView: string;
}

export interface RagConfig {
  httpUrl: string | null;
  timeoutMs: number;
  topK: number;
}

export interface ServerConfig {
  port: number;
  corsOrigin: string | null;
}

type NumberBounds = {
  min?: number;
  max?: number;
};

export const DEFAULT_INVENTORY_VIEW = 'inventory_items';
export const DEFAULT_ORDERS_VIEW = 'sales_orders';

// Plain or schema-qualified identifier, safe to interpolate into SQL text
const SQL_IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_]*(\.[A-Za-z_][A-Za-z0-9_]*)?$/;

function clamp(value: number, bounds?: NumberBounds): number {
  if (!bounds) {
    return value;
  }
  const { min, max } = bounds;
  let result = value;
  if (typeof min === 'number' && result < min) {
    result = min;
  }
  if (typeof max === 'number' && result > max) {
    result = max;
  }
  return result;
}

function parseIntegerSetting(name: string, defaultValue: number, bounds?: NumberBounds): number {
  const raw = process.env[name];
  if (raw == null) {
    return defaultValue;
  }

  const numeric = Number.parseInt(raw, 10);
  if (!Number.isFinite(numeric)) {
    return defaultValue;
  }

  return clamp(numeric, bounds);
}

function parseStringSetting(name: string): string | null {
  const raw = process.env[name];
  if (raw == null) {
    return null;
  }
  const trimmed = raw.trim();
  return trimmed.length > 0 ? trimmed : null;
}

function parseIdentifierSetting(name: string, defaultValue: string): string {
  const raw = parseStringSetting(name);
  if (!raw || !SQL_IDENTIFIER.test(raw)) {
    return defaultValue;
  }
  return raw;
}

export function parseBooleanSetting(name: string, defaultValue: boolean): boolean {
  const raw = process.env[name];
  if (raw == null) {
    return defaultValue;
  }

  const normalized = raw.trim().toLowerCase();
  if (!normalized) {
    return defaultValue;
  }

  if (['true', '1', 'yes', 'on'].includes(normalized)) {
    return true;
  }
  if (['false', '0', 'no', 'off'].includes(normalized)) {
    return false;
  }

  return defaultValue;
}

export function getChatbotDataConfig(): ChatbotDataConfig {
  const maxLimit = parseIntegerSetting('CHATBOT_MAX_LIMIT', 50, { min: 1, max: 500 });
  return {
    defaultLimit: parseIntegerSetting('CHATBOT_DEFAULT_LIMIT', 10, { min: 1, max: maxLimit }),
    maxLimit,
    lowStockThreshold: parseIntegerSetting('CHATBOT_LOW_STOCK_THRESHOLD', 5, { min: 0 }),
    inventoryView: parseIdentifierSetting('CHATBOT_INVENTORY_VIEW', DEFAULT_INVENTORY_VIEW),
    ordersView: parseIdentifierSetting('CHATBOT_ORDERS_VIEW', DEFAULT_ORDERS_VIEW),
  };
}

export function getRagConfig(): RagConfig {
  return {
    httpUrl: parseStringSetting('DOCS_RAG_HTTP_URL'),
    timeoutMs: parseIntegerSetting('DOCS_RAG_TIMEOUT_MS', 3500, { min: 1 }),
    topK: parseIntegerSetting('DOCS_RAG_TOP_K', 5, { min: 1, max: 20 }),
  };
}

export function getServerConfig(): ServerConfig {
  return {
    port: parseIntegerSetting('PORT', 5001, { min: 1, max: 65535 }),
    corsOrigin: parseStringSetting('CORS_ORIGIN'),
  };
}
