/**
 * Sales export text format
 *
 * One header line, then one line per sale item. Every data field is wrapped
 * in double quotes with embedded quotes doubled; lines end with a single \n.
 */

import { ProductLookup, Transaction } from '../../types/sales';
import { ExportLabels } from './export.labels';

export const COLUMN_COUNT = 14;

export interface EventNameLookup {
  eventName(id: string): string;
}

const pad = (value: number): string => String(value).padStart(2, '0');

/**
 * `yyyy-MM-dd HH:mm:ss` in the process's local time zone
 */
export const formatDateTime = (date: Date): string =>
  `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
  `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;

export const quoteField = (value: string): string => `"${value.replace(/"/g, '""')}"`;

export const formatRow = (fields: readonly string[]): string =>
  `${fields.map(quoteField).join(',')}\n`;

export const formatHeader = (labels: ExportLabels): string => `${labels.header.join(',')}\n`;

const flag = (value: boolean): string => (value ? '1' : '0');

/**
 * Field values for each item of a transaction whose product still exists.
 * Names and prices come from the catalog as it is now.
 */
export const transactionRows = (
  transaction: Transaction,
  products: ProductLookup,
  events: EventNameLookup,
  labels: ExportLabels
): string[][] => {
  const eventName = events.eventName(transaction.eventId);
  const dateTime = formatDateTime(transaction.date);
  const notes = transaction.notes.replace(/\n/g, ' ');

  return transaction.items.flatMap((item) => {
    const product = products.findProduct(item.productId);
    if (!product) {
      return [];
    }
    return [
      [
        eventName,
        dateTime,
        product.name,
        String(item.quantity),
        String(Math.trunc(product.price)),
        String(Math.trunc(item.quantity * product.price)),
        labels.ageGroup[transaction.ageGroup],
        labels.gender[transaction.gender],
        labels.channel[transaction.channel],
        flag(transaction.isExhibitor),
        flag(transaction.isAcquaintance),
        flag(transaction.isCashless),
        flag(transaction.isReserved),
        notes,
      ],
    ];
  });
};

/**
 * Split one exported line back into its field values, undoing the quoting.
 * Accepts unquoted fields as well, so the header parses too.
 */
export const parseCsvLine = (line: string): string[] => {
  const text = line.endsWith('\n') ? line.slice(0, -1) : line;
  const fields: string[] = [];
  let current = '';
  let inQuotes = false;

  for (let i = 0; i < text.length; i++) {
    const char = text[i];
    if (inQuotes) {
      if (char === '"' && text[i + 1] === '"') {
        current += '"';
        i++;
      } else if (char === '"') {
        inQuotes = false;
      } else {
        current += char;
      }
    } else if (char === '"') {
      inQuotes = true;
    } else if (char === ',') {
      fields.push(current);
      current = '';
    } else {
      current += char;
    }
  }
  fields.push(current);

  return fields;
};
