import type { OrderRecord, PartWithAvailability, PartWithStatus } from './types';

const MAX_LISTED_PARTS = 5;

function formatPartHeader(part: { itemName: string; itemCode: string }): string {
  return `📦 *${part.itemName}*\n🔢 Código: \`${part.itemCode}\``;
}

function percentOrDefault(value: number | null): string {
  return value === null ? '0%' : String(value);
}

export function formatPartReply(term: string, parts: PartWithAvailability[]): string {
  if (parts.length === 0) {
    return `❌ No encontré ninguna pieza con '${term}' en el sistema.`;
  }

  if (parts.length === 1) {
    const [part] = parts;
    let reply = formatPartHeader(part);
    if (part.availability.length > 0) {
      reply += '\n🧮 *Disponibilidad:*';
      for (const entry of part.availability) {
        reply += `\n- ${entry.warehouse ?? 'Sin bodega'}: ${entry.quantity} unidades`;
      }
    } else {
      reply += '\n❌ Sin stock disponible';
    }
    return reply;
  }

  let reply = `🔍 Encontré ${parts.length} piezas relacionadas con '${term}':\n\n`;
  parts.slice(0, MAX_LISTED_PARTS).forEach((part, index) => {
    reply += `${index + 1}. *${part.itemName}* (\`${part.itemCode}\`)\n`;
  });
  if (parts.length > MAX_LISTED_PARTS) {
    reply += `\n... y ${parts.length - MAX_LISTED_PARTS} más.`;
  }
  return reply;
}

export function formatOrderReply(orderNumber: string, order: OrderRecord | null): string {
  if (!order) {
    return `❌ No encontré la orden número ${orderNumber} en el sistema.`;
  }

  return [
    `📄 *Orden #${orderNumber} - ${order.cardName ?? 'Cliente desconocido'}*`,
    `💰 Pagado: *${percentOrDefault(order.paidToDate)}*`,
    `🧾 Facturado: *${percentOrDefault(order.invoicedToDate)}*`,
    `🚚 Entregado: *${percentOrDefault(order.deliveredToDate)}*`,
  ].join('\n');
}

export function formatInvalidOrderNumber(orderNumber: string): string {
  return `⚠️ '${orderNumber}' no es un número de orden válido.`;
}

export function formatStatusReply(term: string, parts: PartWithStatus[]): string {
  if (parts.length === 0) {
    return `❌ No encontré ninguna pieza '${term}' para consultar estatus.`;
  }

  if (parts.length > 1) {
    return `🔍 Encontré ${parts.length} piezas con '${term}'. Especifica más para ver el estatus.`;
  }

  const [part] = parts;
  let reply = formatPartHeader(part);
  if (part.status) {
    reply += `\n📄 Estatus: *${part.status.commitStatus ?? 'N/D'}*`;
    reply += `\n🕓 Actualizado: ${part.status.updatedAt ?? 'N/D'}`;
  } else {
    reply += '\n⚠️ Sin información de estatus';
  }
  return reply;
}

export function formatPartLookupError(term: string): string {
  return `⚠️ Error consultando '${term}'. Intenta con el menú principal.`;
}

export function formatOrderLookupError(orderNumber: string): string {
  return `⚠️ Error consultando orden ${orderNumber}.`;
}

export function formatStatusLookupError(term: string): string {
  return `⚠️ Error consultando estatus de '${term}'.`;
}
