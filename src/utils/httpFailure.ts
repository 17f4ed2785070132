import { z } from "zod";

/**
 * The parts of an axios (or axios-shaped) rejection that retry and
 * classification decisions need.
 */
export interface HttpFailure {
    message: string;
    status?: number;
    /** Socket / axios error code, e.g. ECONNREFUSED, ECONNABORTED */
    code?: string;
    /** Response body, when the server answered */
    data?: unknown;
    retryAfterMs?: number;
}

const failureShape = z.object({
    message: z.string().catch(""),
    code: z.string().optional().catch(undefined),
    response: z
        .object({
            status: z.number().optional().catch(undefined),
            data: z.unknown(),
            headers: z
                .object({
                    "retry-after": z.union([z.string(), z.number()]).optional(),
                })
                .optional()
                .catch(undefined),
        })
        .optional()
        .catch(undefined),
});

function parseRetryAfter(value: string | number | undefined): number | undefined {
    if (value === undefined) {
        return undefined;
    }
    const seconds = parseInt(String(value), 10);
    return isNaN(seconds) ? undefined : seconds * 1000;
}

export function readHttpFailure(error: unknown): HttpFailure {
    const parsed = failureShape.safeParse(error);
    if (!parsed.success) {
        return { message: String(error) };
    }

    const { message, code, response } = parsed.data;
    return {
        message,
        code,
        status: response?.status,
        data: response?.data,
        retryAfterMs: parseRetryAfter(response?.headers?.["retry-after"]),
    };
}
