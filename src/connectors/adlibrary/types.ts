import type { PaginationOptions } from '../types';

export interface AdLibraryConnectorOptions extends PaginationOptions {
  /**
   * Search endpoint of the ad library API (query parameters are appended)
   */
  baseUrl: string;
}

/**
 * Query string sent with each page request
 */
export interface AdLibraryQueryParams {
  search_term: string;
  page: number;
  region: string;
}
