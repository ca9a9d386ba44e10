/**
 * One row of a category's output file.
 */
export interface GameDetailRecord {
  appId: number;
  name: string;

  currentPrice: string;
  originalPrice: string;

  // The appdetails endpoint has no review score, so this is always "N/A".
  reviewRating: string;
  reviewCount: number;

  releaseDate: string;
  developer: string;
  genre: string;

  recommendedRequirements: string;

  storeUrl: string;
}

export interface StoreLocale {
  /**
   * Store language, e.g. `schinese` or `english`.
   */
  language: string;

  /**
   * Two letter store region; decides the currency of the price fields.
   */
  countryCode: string;
}
