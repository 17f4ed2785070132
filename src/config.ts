import dotenv from "dotenv";
import { z } from "zod";
import { BRAND_NAME, BRAND_VERSION, buildMusicBrainzUserAgent } from "./config/brand";
import { ConfigurationError, ErrorCode } from "./utils/errors";
import { parseEnvFloat, parseEnvInt } from "./utils/envParsers";
import { isLogLevel } from "./utils/logger";

dotenv.config();

export const PLACEHOLDER_API_KEY = "your-api-key-here";
export const MIN_MUSICBRAINZ_DELAY_SECONDS = 1.0;

const numeric = (name: string) =>
    z
        .string()
        .regex(/^\s*(\d+(\.\d+)?)?\s*$/, `${name} must be a non-negative number`)
        .optional();

const integer = (name: string) =>
    z
        .string()
        .regex(/^\s*(\d+)?\s*$/, `${name} must be a non-negative integer`)
        .optional();

const envSchema = z.object({
    LIDARR_BASE_URL: z
        .string()
        .url("LIDARR_BASE_URL must be a valid URL")
        .optional()
        .or(z.literal("")),
    LIDARR_API_KEY: z.string().optional(),
    QUALITY_PROFILE_ID: integer("QUALITY_PROFILE_ID"),
    METADATA_PROFILE_ID: integer("METADATA_PROFILE_ID"),
    ROOT_FOLDER_PATH: z.string().optional(),
    LIDARR_REQUEST_DELAY: numeric("LIDARR_REQUEST_DELAY"),
    LIDARR_TIMEOUT: numeric("LIDARR_TIMEOUT"),
    MAX_RETRIES: integer("MAX_RETRIES"),
    RETRY_DELAY: numeric("RETRY_DELAY"),
    API_ERROR_DELAY: numeric("API_ERROR_DELAY"),
    BATCH_SIZE: integer("BATCH_SIZE"),
    BATCH_PAUSE: numeric("BATCH_PAUSE"),
    MUSICBRAINZ_DELAY: numeric("MUSICBRAINZ_DELAY"),
    MUSICBRAINZ_TIMEOUT: numeric("MUSICBRAINZ_TIMEOUT"),
    MUSICBRAINZ_APP_NAME: z.string().optional(),
    MUSICBRAINZ_APP_VERSION: z.string().optional(),
    MUSICBRAINZ_CONTACT: z.string().optional(),
    LOG_LEVEL: z
        .string()
        .optional()
        .refine(
            (value) => !value || isLogLevel(value.trim().toLowerCase()),
            "LOG_LEVEL must be one of debug, info, warn, error, silent"
        ),
});

export interface LidarrConfig {
    baseUrl: string;
    apiKey: string;
    qualityProfileId: number;
    metadataProfileId: number;
    rootFolderPath: string;
    timeoutMs: number;
}

export interface PacingConfig {
    /** Wait before each row's first Lidarr call */
    requestDelayMs: number;
    maxRetries: number;
    retryDelayMs: number;
    /** Extra wait after a row ended in a transport error */
    apiErrorDelayMs: number;
    batchSize: number;
    batchPauseMs: number;
}

export interface MusicBrainzConfig {
    delayMs: number;
    timeoutMs: number;
    userAgent: string;
}

export interface AppConfig {
    lidarr: LidarrConfig;
    pacing: PacingConfig;
    musicbrainz: MusicBrainzConfig;
}

export interface LoadConfigOptions {
    /** Importer runs need a real key; the parser does not talk to Lidarr. */
    requireLidarrApiKey?: boolean;
}

function seconds(value: string | undefined, fallback: number): number {
    return Math.round(parseEnvFloat(value?.trim(), fallback) * 1000);
}

/**
 * Validates the environment and builds the runtime configuration.
 * Throws ConfigurationError listing every invalid variable.
 */
export function loadConfig(
    env: NodeJS.ProcessEnv = process.env,
    options: LoadConfigOptions = {}
): AppConfig {
    const parsed = envSchema.safeParse(env);
    if (!parsed.success) {
        const issues = parsed.error.errors.map(
            (err) => `${err.path.join(".")}: ${err.message}`
        );
        throw new ConfigurationError("Environment validation failed", issues);
    }

    const vars = parsed.data;
    const apiKey = vars.LIDARR_API_KEY?.trim() ?? "";

    if (
        options.requireLidarrApiKey &&
        (apiKey.length === 0 || apiKey === PLACEHOLDER_API_KEY)
    ) {
        throw new ConfigurationError(
            "LIDARR_API_KEY is not set. Copy .env.example to .env and add your Lidarr API key (Settings > General).",
            ["LIDARR_API_KEY: required"],
            ErrorCode.MISSING_API_KEY
        );
    }

    const mbDelaySeconds = Math.max(
        parseEnvFloat(vars.MUSICBRAINZ_DELAY?.trim(), 2.0),
        MIN_MUSICBRAINZ_DELAY_SECONDS
    );

    return {
        lidarr: {
            baseUrl: (vars.LIDARR_BASE_URL || "http://localhost:8686").replace(/\/+$/, ""),
            apiKey,
            qualityProfileId: parseEnvInt(vars.QUALITY_PROFILE_ID?.trim(), 1),
            metadataProfileId: parseEnvInt(vars.METADATA_PROFILE_ID?.trim(), 1),
            rootFolderPath: vars.ROOT_FOLDER_PATH?.trim() || "/music",
            timeoutMs: seconds(vars.LIDARR_TIMEOUT, 30),
        },
        pacing: {
            requestDelayMs: seconds(vars.LIDARR_REQUEST_DELAY, 2.0),
            maxRetries: parseEnvInt(vars.MAX_RETRIES?.trim(), 3),
            retryDelayMs: seconds(vars.RETRY_DELAY, 5),
            apiErrorDelayMs: seconds(vars.API_ERROR_DELAY, 5),
            batchSize: Math.max(1, parseEnvInt(vars.BATCH_SIZE?.trim(), 10)),
            batchPauseMs: seconds(vars.BATCH_PAUSE, 10),
        },
        musicbrainz: {
            delayMs: Math.round(mbDelaySeconds * 1000),
            timeoutMs: seconds(vars.MUSICBRAINZ_TIMEOUT, 30),
            userAgent: buildMusicBrainzUserAgent(
                vars.MUSICBRAINZ_APP_NAME?.trim() || BRAND_NAME,
                vars.MUSICBRAINZ_APP_VERSION?.trim() || BRAND_VERSION,
                vars.MUSICBRAINZ_CONTACT?.trim() || "contact@example.com"
            ),
        },
    };
}
