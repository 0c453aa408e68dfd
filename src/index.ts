// src/index.ts

export { AdScraperSDK } from './sdk';
export type { InitConfig } from './sdk';
export type {
  CanonicalAdRecord,
  RawAdRecord,
  LocationTargeting,
  AgeTargeting,
  GenderTargeting,
  AgeBand,
} from './core/normalizer/types';
export type {
  Connector,
  PageFetcher,
  PageFetchResult,
  PageQuery,
  ScrapeParams,
} from './connectors/types';
export type { ExportFormat } from './exporters/serializers';

// Normalization building blocks
export { AdNormalizer, CanonicalAdRecordSchema } from './core/normalizer/Normalizer';
export { normalizeTargeting } from './core/normalizer/TargetingNormalizer';
export { locateAds } from './core/normalizer/PayloadLocator';
export { FIELD_ALIASES } from './core/normalizer/FieldAliases';
export { parseTimestamp } from './utils/timestamp';
export { ensureString, ensureInteger } from './utils/coerce';

// Connectors and export
export { BaseConnector } from './connectors/BaseConnector';
export { AdLibraryConnector } from './connectors/adlibrary/AdLibraryConnector';
export { FetcherConnector } from './connectors/fetcher/FetcherConnector';
export { Exporter } from './exporters/Exporter';

// Export error classes for error handling
export {
  ScraperError,
  ConfigError,
  ApiError,
  ApiClientError,
  ApiServerError,
  InvalidResponseError,
  NetworkError,
  NetworkTimeoutError,
  NormalizationError,
  ExportError,
  UnsupportedExportFormatError,
} from './utils/errors';
