/**
 * Message Formatter
 *
 * Builds the plain-text notifications sent to the admin chat.
 */

import type { FeedbackForm, OrderItem, OrderRequest } from './types.js';

/**
 * +7 (XXX) XXX-XX-XX
 */
export function formatPhone(digits: string): string {
  return `+7 (${digits.slice(0, 3)}) ${digits.slice(3, 6)}-${digits.slice(6, 8)}-${digits.slice(8)}`;
}

/**
 * dd.mm.yyyy HH:MM in the given time zone
 */
export function formatTimestamp(date: Date, timeZone: string): string {
  const parts = new Intl.DateTimeFormat('en-GB', {
    timeZone,
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
    hour: '2-digit',
    minute: '2-digit',
    hourCycle: 'h23',
  }).formatToParts(date);

  const part = (type: Intl.DateTimeFormatPartTypes): string =>
    parts.find((p) => p.type === type)?.value ?? '';

  return `${part('day')}.${part('month')}.${part('year')} ${part('hour')}:${part('minute')}`;
}

export function buildFeedbackMessage(form: FeedbackForm, now: Date, timeZone: string): string {
  const lines = [
    '📌 New request from the website:',
    `🕒 ${formatTimestamp(now, timeZone)}`,
    `👤 First name: ${form.firstname}`,
  ];

  if (form.lastname) {
    lines.push(`👤 Last name: ${form.lastname}`);
  }
  if (form.patronymic) {
    lines.push(`👤 Patronymic: ${form.patronymic}`);
  }

  lines.push(
    `📞 Phone: ${formatPhone(form.phone)}`,
    `📝 Message: ${form.message.trim() || 'not provided'}`
  );

  return lines.join('\n');
}

function formatOrderItem(item: OrderItem): string {
  return `- ${item.name}: ${item.quantity} ${item.unit} × ${item.pricePerUnit} ₽ = ${item.price} ₽`;
}

/**
 * Expects an order that passed validateOrder
 */
export function buildOrderMessage(request: OrderRequest, now: Date, timeZone: string): string {
  const lines = [
    '📦 NEW ORDER',
    `👤 Name: ${request.name ?? ''}`,
    `📞 Phone: ${formatPhone(request.phone ?? '')}`,
    `💬 Comment: ${request.comment?.trim() || 'not provided'}`,
    '',
    '🛒 Order items:',
    ...request.order.items.map(formatOrderItem),
    '',
    `💰 Total: ${request.order.total} ₽`,
    `🕒 ${formatTimestamp(now, timeZone)}`,
  ];

  return lines.join('\n');
}
