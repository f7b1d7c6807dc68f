/**
 * Sales domain types
 *
 * Enumerations keep their declaration order: it is the order the export labels
 * and request validators present them in.
 */

export enum AgeGroup {
  UNDER_18 = 'under18',
  TWENTIES = 'twenties',
  THIRTIES = 'thirties',
  FORTIES = 'forties',
  FIFTIES_PLUS = 'fiftiesPlus',
}

export enum Gender {
  MALE = 'male',
  FEMALE = 'female',
  OTHER = 'other',
}

export enum MarketingChannel {
  SNS = 'sns',
  BLOG = 'blog',
  PASSERBY = 'passerby',
  SAMPLE_BOOK = 'sampleBook',
  REFERRAL = 'referral',
  STAFF = 'staff',
}

export const AGE_GROUPS: readonly AgeGroup[] = Object.values(AgeGroup);
export const GENDERS: readonly Gender[] = Object.values(Gender);
export const MARKETING_CHANNELS: readonly MarketingChannel[] = Object.values(MarketingChannel);

// =============================================================================
// CATALOG
// =============================================================================

interface ProductBase {
  id: string;
  name: string;
  /** Unit price in whole currency units */
  price: number;
  /** Opaque handle to an image held by the presentation layer */
  imageRef: string | null;
  inventoryManaged: boolean;
}

export interface SimpleProduct extends ProductBase {
  kind: 'simple';
  stock: number;
}

/**
 * A product sold as a set of other products. Its availability derives from
 * its components; it has no stock of its own.
 */
export interface BundleProduct extends ProductBase {
  kind: 'bundle';
  componentIds: string[];
}

export type Product = SimpleProduct | BundleProduct;

export const isBundle = (product: Product): product is BundleProduct =>
  product.kind === 'bundle';

export interface ProductLookup {
  findProduct(id: string): Product | undefined;
}

// =============================================================================
// EVENTS
// =============================================================================

export interface SalesEvent {
  id: string;
  name: string;
}

// =============================================================================
// LEDGER
// =============================================================================

export interface SaleItem {
  id: string;
  productId: string;
  quantity: number;
}

export interface CustomerProfile {
  ageGroup: AgeGroup;
  gender: Gender;
  channel: MarketingChannel;
  isExhibitor: boolean;
  isAcquaintance: boolean;
  isCashless: boolean;
  isReserved: boolean;
  notes: string;
}

export interface Transaction extends CustomerProfile {
  id: string;
  date: Date;
  items: SaleItem[];
  eventId: string;
}

export const defaultCustomerProfile = (): CustomerProfile => ({
  ageGroup: AgeGroup.TWENTIES,
  gender: Gender.MALE,
  channel: MarketingChannel.SNS,
  isExhibitor: false,
  isAcquaintance: false,
  isCashless: false,
  isReserved: false,
  notes: '',
});

// =============================================================================
// SUMMARY
// =============================================================================

export interface ProductSummary {
  productId: string;
  productName: string;
  count: number;
  total: number;
  /** null when the product is not inventory managed */
  remainingStock: number | null;
}
