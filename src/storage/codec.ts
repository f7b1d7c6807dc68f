/**
 * JSON encodings of the persisted blobs.
 *
 * Decoders return null for anything that does not match the expected shape;
 * callers then fall back to their empty or default state.
 */

import { z } from 'zod';

import {
  AgeGroup,
  Gender,
  MarketingChannel,
  Product,
  SalesEvent,
  Transaction,
} from '../types/sales';

const parseJson = (raw: string): unknown => {
  try {
    return JSON.parse(raw);
  } catch {
    return undefined;
  }
};

// =============================================================================
// PRODUCTS
// =============================================================================

export interface CatalogBlob {
  products: Product[];
}

const ProductBaseSchema = z.object({
  id: z.string(),
  name: z.string(),
  price: z.number().nonnegative(),
  imageRef: z
    .string()
    .nullish()
    .transform((value) => value ?? null),
  inventoryManaged: z.boolean(),
});

export const ProductSchema = z.discriminatedUnion('kind', [
  ProductBaseSchema.extend({
    kind: z.literal('simple'),
    stock: z.number().int().nonnegative(),
  }),
  ProductBaseSchema.extend({
    kind: z.literal('bundle'),
    componentIds: z.array(z.string()),
  }),
]);

const CatalogBlobSchema = z.object({
  products: z.array(ProductSchema),
});

export const decodeProduct = (value: unknown): Product | null => {
  const result = ProductSchema.safeParse(value);
  return result.success ? result.data : null;
};

export const encodeCatalog = (products: readonly Product[]): string => {
  const blob: CatalogBlob = { products: [...products] };
  return JSON.stringify(blob);
};

export const decodeCatalog = (raw: string): Product[] | null => {
  const result = CatalogBlobSchema.safeParse(parseJson(raw));
  return result.success ? result.data.products : null;
};

// =============================================================================
// EVENTS
// =============================================================================

export interface EventsBlob {
  events: SalesEvent[];
  selectedId: string | null;
}

const EventsBlobSchema = z.object({
  events: z.array(z.object({ id: z.string(), name: z.string() })),
  selectedId: z.string().nullable().catch(null),
});

export const encodeEvents = (blob: EventsBlob): string => JSON.stringify(blob);

export const decodeEvents = (raw: string): EventsBlob | null => {
  const result = EventsBlobSchema.safeParse(parseJson(raw));
  return result.success ? result.data : null;
};

// =============================================================================
// TRANSACTIONS
// =============================================================================

const SaleItemSchema = z.object({
  id: z.string(),
  productId: z.string(),
  quantity: z.number().int().positive(),
});

export const TransactionSchema = z.object({
  id: z.string(),
  date: z
    .string()
    .datetime({ offset: true })
    .transform((value) => new Date(value)),
  items: z.array(SaleItemSchema),
  ageGroup: z.nativeEnum(AgeGroup),
  gender: z.nativeEnum(Gender),
  channel: z.nativeEnum(MarketingChannel),
  isExhibitor: z.boolean(),
  isAcquaintance: z.boolean(),
  // Older records predate these two flags
  isCashless: z.boolean().default(false),
  isReserved: z.boolean().default(false),
  notes: z.string(),
  eventId: z.string(),
});

const LedgerBlobSchema = z.array(TransactionSchema);

export const decodeTransaction = (value: unknown): Transaction | null => {
  const result = TransactionSchema.safeParse(value);
  return result.success ? result.data : null;
};

export const encodeLedger = (transactions: readonly Transaction[]): string =>
  JSON.stringify(transactions);

export const decodeLedger = (raw: string): Transaction[] | null => {
  const result = LedgerBlobSchema.safeParse(parseJson(raw));
  return result.success ? result.data : null;
};
