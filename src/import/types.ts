/**
 * Import Types
 */

export type Delimiter = 'auto' | 'comma' | 'tab' | 'pipe';

/** One SKU / new-price pair as read from pasted text or a file */
export interface PricePair {
  sku: string;
  newPrice: string;
}

export interface PasteResult {
  pairs: PricePair[];
  /** True when the first line looked like a "SKU, New Price" header and was skipped */
  headerSkipped: boolean;
}
