import { isPlaceholderImage, type Deal } from './types';

const imageRank = (deal: Deal): number => (isPlaceholderImage(deal.image) ? 0 : 1);

/**
 * Tiered order: relevance, then having a real image, then price. Unknown
 * prices are 0 and so fall behind priced deals within a tier.
 */
export const compareDeals = (a: Deal, b: Deal): number =>
  b.relevance - a.relevance || imageRank(b) - imageRank(a) || b.price - a.price;

/** Sorted copy with repeated product links collapsed onto their best-ranked deal. */
export const rankDeals = (deals: readonly Deal[]): Deal[] => {
  const seen = new Set<string>();
  const ranked: Deal[] = [];
  for (const deal of [...deals].sort(compareDeals)) {
    const key = deal.productUrl.toLowerCase();
    if (seen.has(key)) continue;
    seen.add(key);
    ranked.push(deal);
  }
  return ranked;
};
