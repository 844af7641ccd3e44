export type QueryIntent =
  | { type: 'part'; term: string; originalText: string }
  | { type: 'order'; number: string; originalText: string }
  | { type: 'status'; term: string; originalText: string };

// A "word" is any run of letters or digits in any script, plus underscore
const W = '([\\p{L}\\p{N}_]+)';
const N = '(\\p{Nd}+)';

function patterns(sources: string[]): RegExp[] {
  return sources.map((source) => new RegExp(source, 'u'));
}

const PART_PATTERNS = patterns([
  `(?:pieza|parte|componente|item|artículo)\\s+${W}`,
  `código\\s+${W}`,
  `disponibilidad\\s+(?:de\\s+)?${W}`,
  `stock\\s+(?:de\\s+)?${W}`,
  `inventario\\s+(?:de\\s+)?${W}`,
  `cuánto[as]?\\s+(?:tenemos|hay)\\s+(?:de\\s+)?${W}`,
  `buscar\\s+${W}`,
  `${W}\\s+disponible`,
  `tenemos\\s+${W}`,
  `hay\\s+${W}`,
  `mostrar\\s+${W}`,
  `información\\s+(?:de\\s+)?${W}`,
]);

const ORDER_PATTERNS = patterns([
  `orden\\s+${N}`,
  `pedido\\s+${N}`,
  `número\\s+${N}`,
  `estado\\s+(?:de\\s+)?(?:orden\\s+)?${N}`,
  `facturación\\s+${N}`,
  `entrega\\s+${N}`,
  `consultar\\s+${N}`,
  `ver\\s+orden\\s+${N}`,
]);

const STATUS_PATTERNS = patterns([
  `estatus\\s+(?:de\\s+)?${W}`,
  `estado\\s+(?:de\\s+)?${W}`,
  `situación\\s+(?:de\\s+)?${W}`,
  `cómo\\s+está\\s+${W}`,
  `actualización\\s+(?:de\\s+)?${W}`,
  `proceso\\s+(?:de\\s+)?${W}`,
]);

const DECIMAL_DIGIT = /\p{Nd}/u;

// Decimal digits are encoded in runs of ten, 0 through 9, in every script
function digitValue(codePoint: number): number {
  let start = codePoint;
  while (start > 0 && DECIMAL_DIGIT.test(String.fromCodePoint(start - 1))) {
    start -= 1;
  }
  return (codePoint - start) % 10;
}

export function toAsciiDigits(digits: string): string {
  let out = '';
  for (const char of digits) {
    const codePoint = char.codePointAt(0) ?? 0;
    out += codePoint >= 0x30 && codePoint <= 0x39 ? char : String(digitValue(codePoint));
  }
  return out;
}

function firstCapture(text: string, candidates: RegExp[]): string | null {
  for (const pattern of candidates) {
    const match = pattern.exec(text);
    if (match && match[1]) {
      return match[1];
    }
  }
  return null;
}

/**
 * Detects whether a chat message asks for a part, an order or a part status.
 * Part phrasing is checked first, then orders, then status.
 */
export function detectQueryIntent(text: string): QueryIntent | null {
  const lowered = text.toLowerCase();

  const partTerm = firstCapture(lowered, PART_PATTERNS);
  if (partTerm) {
    return { type: 'part', term: partTerm, originalText: text };
  }

  const orderNumber = firstCapture(lowered, ORDER_PATTERNS);
  if (orderNumber) {
    return { type: 'order', number: toAsciiDigits(orderNumber), originalText: text };
  }

  const statusTerm = firstCapture(lowered, STATUS_PATTERNS);
  if (statusTerm) {
    return { type: 'status', term: statusTerm, originalText: text };
  }

  return null;
}
