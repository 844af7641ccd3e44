import { getRagConfig, RagConfig } from '../config';
import { logger } from '../utils/logger';

export interface RagCitation {
  title: string;
  path: string;
  score: number;
}

export interface RagResponse {
  answer: string | null;
  citations: RagCitation[];
}

const DEFAULT_RESULT: RagResponse = { answer: null, citations: [] };

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

function toCitation(value: unknown): RagCitation | null {
  if (!isRecord(value)) {
    return null;
  }
  const score = Number(value.score);
  return {
    title: typeof value.title === 'string' ? value.title : '',
    path: typeof value.path === 'string' ? value.path : '',
    score: Number.isFinite(score) ? score : 0,
  };
}

function parseResponse(data: unknown): RagResponse {
  if (!isRecord(data)) {
    return DEFAULT_RESULT;
  }
  const citations = Array.isArray(data.citations)
    ? data.citations.map(toCitation).filter((c): c is RagCitation => c !== null)
    : [];
  return {
    answer: typeof data.answer === 'string' ? data.answer : null,
    citations,
  };
}

/**
 * Sends a free-text question to the documents RAG service. Any failure, timeout
 * or missing configuration yields an empty answer.
 */
export async function queryDocsRag(query: string, config: RagConfig = getRagConfig()): Promise<RagResponse> {
  if (!config.httpUrl) {
    return DEFAULT_RESULT;
  }

  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), config.timeoutMs);

  try {
    const response = await fetch(config.httpUrl, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
      },
      body: JSON.stringify({ query, top_k: config.topK }),
      signal: controller.signal,
    });

    if (!response.ok) {
      logger.warn('[rag] non-OK response', { status: response.status });
      return DEFAULT_RESULT;
    }

    return parseResponse(await response.json());
  } catch (error) {
    logger.warn('[rag] request failed', { err: logger.serializeError(error) });
    return DEFAULT_RESULT;
  } finally {
    clearTimeout(timeout);
  }
}
