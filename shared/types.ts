export interface Deal {
  id: string;
  title: string;
  /** Amazon product or search URL carrying the affiliate tag. */
  productUrl: string;
  /** Product image URL, or the inline placeholder when none was found. */
  image: string;
  relevance: number;
  /** 0 when the listing did not state a price. */
  price: number;
  sourceUrl: string | null;
  /** Set only on deals served from the top-deals view. */
  category?: string;
}

export interface QueryResult {
  deals: Deal[];
}

export interface TopDealsResult extends QueryResult {
  lastUpdated: string | null;
}
