/**
 * Rate Limiter Service
 *
 * Paces every outbound MusicBrainz and Lidarr request through a per-service
 * queue, retrying rate-limited and transient failures with exponential backoff.
 * A circuit breaker pauses a service after repeated 429 responses.
 */

import PQueue from "p-queue";
import { AppConfig } from "../config";
import { sleep } from "../utils/async";
import { ApiError, RateLimitError } from "../utils/errors";
import { HttpFailure, readHttpFailure } from "../utils/httpFailure";
import { createLogger } from "../utils/logger";

const logger = createLogger("RateLimiter");

export interface RateLimitConfig {
    /** Requests per interval */
    intervalCap: number;
    /** Interval in milliseconds */
    interval: number;
    /** Maximum concurrent requests */
    concurrency: number;
    /** Maximum retries on 429 / transient failures */
    maxRetries: number;
    /** Base delay for exponential backoff (ms) */
    baseDelay: number;
    /** Upper bound of the random jitter added to each backoff (ms) */
    maxJitter: number;
}

export interface ServiceConfig {
    musicbrainz: RateLimitConfig;
    lidarr: RateLimitConfig;
}

export type ServiceName = keyof ServiceConfig;

const SERVICE_NAMES: readonly ServiceName[] = ["musicbrainz", "lidarr"];

const CIRCUIT_RESET_MS = 30000;
const CIRCUIT_MAX_RESET_MS = 60000;
const CIRCUIT_FAILURE_LIMIT = 5;
const MAX_BACKOFF_MS = 60000;

/**
 * Builds the per-service limits from the runtime configuration. MusicBrainz
 * allows one request per configured delay; Lidarr is local and only paced
 * by the importer itself.
 */
export function buildServiceConfig(config: AppConfig): ServiceConfig {
    return {
        musicbrainz: {
            intervalCap: 1,
            interval: config.musicbrainz.delayMs,
            concurrency: 1,
            maxRetries: config.pacing.maxRetries,
            baseDelay: config.musicbrainz.delayMs,
            maxJitter: 1000,
        },
        lidarr: {
            intervalCap: 10,
            interval: 1000,
            concurrency: 1,
            maxRetries: config.pacing.maxRetries,
            baseDelay: config.pacing.retryDelayMs,
            maxJitter: 1000,
        },
    };
}

interface CircuitState {
    isOpen: boolean;
    openedAt: number;
    consecutiveFailures: number;
    resetAfterMs: number;
}

type FailureInfo = Pick<HttpFailure, "status" | "code" | "message" | "retryAfterMs">;

const TRANSIENT_CODES = new Set([
    "ECONNRESET",
    "ECONNABORTED",
    "ECONNREFUSED",
    "ETIMEDOUT",
    "EAI_AGAIN",
    "ENOTFOUND",
    "EHOSTUNREACH",
    "ENETUNREACH",
    "ERR_SOCKET_CLOSED",
]);

function describeFailure(error: unknown): FailureInfo {
    if (error instanceof RateLimitError) {
        return { status: 429, message: error.message, retryAfterMs: error.retryAfterMs };
    }
    if (error instanceof ApiError) {
        return { status: error.status, code: error.transportCode, message: error.message };
    }
    return readHttpFailure(error);
}

function isRateLimitFailure(failure: FailureInfo): boolean {
    const message = failure.message.toLowerCase();
    return (
        failure.status === 429 ||
        message.includes("429") ||
        message.includes("rate limit")
    );
}

function isTransientFailure(failure: FailureInfo): boolean {
    if (failure.code && TRANSIENT_CODES.has(failure.code)) {
        return true;
    }

    if (failure.status !== undefined && failure.status >= 500 && failure.status <= 599) {
        return true;
    }

    const message = failure.message.toLowerCase();
    return (
        message.includes("socket hang up") ||
        message.includes("network error") ||
        message.includes("timeout")
    );
}

export class RateLimiter {
    private readonly queues = new Map<ServiceName, PQueue>();
    private readonly circuitBreakers = new Map<ServiceName, CircuitState>();

    constructor(
        private readonly configs: ServiceConfig,
        private readonly wait: (ms: number) => Promise<void> = sleep
    ) {
        for (const service of SERVICE_NAMES) {
            const config = configs[service];
            this.queues.set(
                service,
                new PQueue({
                    concurrency: config.concurrency,
                    intervalCap: config.intervalCap,
                    interval: config.interval,
                    carryoverConcurrencyCount: true,
                })
            );
            this.circuitBreakers.set(service, {
                isOpen: false,
                openedAt: 0,
                consecutiveFailures: 0,
                resetAfterMs: CIRCUIT_RESET_MS,
            });
        }

        logger.debug("Rate limiter initialized");
    }

    /**
     * Execute a request with rate limiting and automatic retry
     */
    async execute<T>(
        service: ServiceName,
        requestFn: () => Promise<T>,
        options?: {
            skipRetry?: boolean;
        }
    ): Promise<T> {
        const queue = this.queues.get(service);
        const circuit = this.circuitBreakers.get(service);
        const config = this.configs[service];

        if (!queue || !circuit) {
            throw new Error(`Unknown service: ${service}`);
        }

        if (circuit.isOpen) {
            const elapsed = Date.now() - circuit.openedAt;
            if (elapsed < circuit.resetAfterMs) {
                const waitTime = circuit.resetAfterMs - elapsed;
                logger.debug(`Circuit breaker open for ${service} - waiting ${waitTime}ms`);
                await this.wait(waitTime);
            }
            circuit.isOpen = false;
            circuit.consecutiveFailures = 0;
        }

        const maxRetries = options?.skipRetry ? 0 : config.maxRetries;

        for (let attempt = 0; ; attempt++) {
            try {
                const result = await queue.add(() => requestFn());
                circuit.consecutiveFailures = 0;
                circuit.resetAfterMs = CIRCUIT_RESET_MS;
                return result;
            } catch (error) {
                const failure = describeFailure(error);
                const rateLimited = isRateLimitFailure(failure);

                if (!rateLimited && !isTransientFailure(failure)) {
                    throw error;
                }

                const delay = this.calculateBackoff(attempt, config, failure);

                if (rateLimited) {
                    circuit.consecutiveFailures++;
                    logger.warn(
                        `Rate limited by ${service} (attempt ${attempt + 1}/${
                            maxRetries + 1
                        }) - backing off ${delay}ms`
                    );

                    if (circuit.consecutiveFailures >= CIRCUIT_FAILURE_LIMIT) {
                        circuit.isOpen = true;
                        circuit.openedAt = Date.now();
                        circuit.resetAfterMs = Math.min(
                            CIRCUIT_MAX_RESET_MS,
                            circuit.resetAfterMs * 2
                        );
                        logger.warn(
                            `Circuit breaker opened for ${service} - will reset in ${circuit.resetAfterMs}ms`
                        );
                    }
                } else {
                    logger.warn(
                        `Transient ${service} error (attempt ${attempt + 1}/${
                            maxRetries + 1
                        }) - retrying in ${delay}ms: ${failure.message}`
                    );
                }

                if (attempt >= maxRetries) {
                    throw error;
                }
                await this.wait(delay);
            }
        }
    }

    /**
     * Retry-After wins; otherwise exponential backoff with jitter, capped.
     */
    private calculateBackoff(
        attempt: number,
        config: RateLimitConfig,
        failure: FailureInfo
    ): number {
        if (failure.retryAfterMs !== undefined) {
            return failure.retryAfterMs;
        }

        const exponentialDelay = config.baseDelay * Math.pow(2, attempt);
        const jitter = Math.random() * config.maxJitter;
        return Math.min(exponentialDelay + jitter, MAX_BACKOFF_MS);
    }
}
