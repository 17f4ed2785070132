export { loadConfig } from "./config";
export type { AppConfig, LidarrConfig, MusicBrainzConfig, PacingConfig } from "./config";
export * from "./utils/errors";
export { createLogger, setLogLevel, attachLogFile } from "./utils/logger";
export type { Logger, LogLevel } from "./utils/logger";
export { normalize, cleanText, stripAlbumSuffixes, decensorProfanity } from "./utils/textNormalizer";
export * from "./services/parser/types";
export { detectFormat, detectColumnOrder, sampleLines } from "./services/parser/formatDetector";
export { parseInput } from "./services/parser/formatParsers";
export { dedupe } from "./services/parser/deduplicator";
export { writeAlbumCsv } from "./services/parser/outputWriter";
export { parseText, enrichEntries, runUniversalParser } from "./services/parser/universalParser";
export type { UniversalParseOptions, UniversalParseResult } from "./services/parser/universalParser";
export type { EnrichmentClient, EnrichmentResult } from "./services/enrichment";
export { MusicBrainzService } from "./services/musicbrainz";
export { LidarrService, classifyLidarrError } from "./services/lidarr";
export { RateLimiter, buildServiceConfig } from "./services/rateLimiter";
export * from "./services/import/status";
export { ImportCsvStore } from "./services/import/csvStore";
export { applyItemFilters } from "./services/import/itemFilters";
export { AlbumImporter } from "./services/import/albumImporter";
export type { ImportRunOptions, ImportSummary, LidarrGateway } from "./services/import/albumImporter";
