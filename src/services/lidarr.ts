import axios, { AxiosInstance } from "axios";
import { z } from "zod";
import { LidarrConfig } from "../config";
import { LidarrApiError } from "../utils/errors";
import { readHttpFailure } from "../utils/httpFailure";
import { createLogger } from "../utils/logger";
import { ImportStatus } from "./import/status";
import { RateLimiter } from "./rateLimiter";

const logger = createLogger("Lidarr");

// Lidarr payloads are echoed back on PUT/POST, so unknown fields are kept.
const artistLookupSchema = z
    .object({
        id: z.number().optional(),
        artistName: z.string(),
        foreignArtistId: z.string(),
        monitored: z.boolean().optional(),
    })
    .passthrough();

const artistSchema = artistLookupSchema.extend({
    id: z.number(),
    monitored: z.boolean().default(false),
});

const albumLookupSchema = z
    .object({
        id: z.number().optional(),
        title: z.string(),
        foreignAlbumId: z.string(),
        artistId: z.number().optional(),
        monitored: z.boolean().optional(),
        artist: z
            .object({ artistName: z.string().optional(), foreignArtistId: z.string().optional() })
            .passthrough()
            .optional(),
    })
    .passthrough();

const albumSchema = albumLookupSchema.extend({
    id: z.number(),
    monitored: z.boolean().default(false),
});

const commandSchema = z
    .object({ id: z.number().optional(), name: z.string().optional(), status: z.string().optional() })
    .passthrough();

/** Artist search result; `id` is set only when already in the library. */
export type LidarrArtistLookup = z.infer<typeof artistLookupSchema>;
export type LidarrArtist = z.infer<typeof artistSchema>;
export type LidarrAlbumLookup = z.infer<typeof albumLookupSchema>;
export type LidarrAlbum = z.infer<typeof albumSchema>;
export type LidarrCommand = z.infer<typeof commandSchema>;

export type LidarrCommandName = "RefreshArtist" | "AlbumSearch";

export interface AddArtistOptions {
    monitored?: boolean;
    searchForMissingAlbums?: boolean;
}

export interface AddAlbumOptions {
    monitored?: boolean;
    searchForMissingAlbums?: boolean;
}

/**
 * Lidarr answers validation failures with `[{ errorMessage }]` and other
 * failures with `{ message }`.
 */
function extractLidarrMessage(data: unknown): string | undefined {
    if (typeof data === "string" && data.trim()) {
        return data.trim();
    }
    const list = z.array(z.object({ errorMessage: z.string() }).passthrough()).safeParse(data);
    if (list.success && list.data.length > 0) {
        return list.data.map((item) => item.errorMessage).join("; ");
    }
    const single = z.object({ message: z.string() }).passthrough().safeParse(data);
    return single.success ? single.data.message : undefined;
}

function toLidarrError(error: unknown, action: string): LidarrApiError {
    if (error instanceof LidarrApiError) {
        return error;
    }
    const failure = readHttpFailure(error);
    const detail = extractLidarrMessage(failure.data) ?? failure.message;
    return new LidarrApiError(`${action} failed: ${detail}`, failure.status, failure.code, {
        action,
    });
}

/** A 409, or a 400 saying the item was already added. */
export function isAlreadyExistsError(error: unknown): boolean {
    if (!(error instanceof LidarrApiError)) {
        return false;
    }
    const message = error.message.toLowerCase();
    return (
        error.status === 409 ||
        message.includes("already exists") ||
        message.includes("already been added")
    );
}

const CONNECTION_CODES = new Set([
    "ECONNREFUSED",
    "ECONNRESET",
    "ENOTFOUND",
    "EAI_AGAIN",
    "EHOSTUNREACH",
    "ENETUNREACH",
    "ERR_SOCKET_CLOSED",
]);

/**
 * Maps a failed Lidarr call onto the row status it should leave behind.
 */
export function classifyLidarrError(error: unknown): ImportStatus {
    const failure =
        error instanceof LidarrApiError
            ? { status: error.status, code: error.transportCode, message: error.message }
            : readHttpFailure(error);
    const message = failure.message.toLowerCase();

    if (failure.status === 401 || failure.status === 403) {
        return "skip_api_error";
    }
    if (failure.status === 400) {
        return "error_invalid_data";
    }
    if (failure.status === 404 || message.includes("not found")) {
        return "skip_no_artist_match";
    }
    if (
        failure.code === "ECONNABORTED" ||
        failure.code === "ETIMEDOUT" ||
        message.includes("timeout")
    ) {
        return "error_timeout";
    }
    if (
        (failure.code !== undefined && CONNECTION_CODES.has(failure.code)) ||
        failure.status === 502 ||
        failure.status === 503 ||
        failure.status === 504 ||
        message.includes("network error") ||
        message.includes("socket hang up")
    ) {
        return "error_connection";
    }
    return "error_unknown";
}

export class LidarrService {
    private client: AxiosInstance;

    constructor(
        private readonly config: LidarrConfig,
        private readonly limiter: RateLimiter
    ) {
        this.client = axios.create({
            baseURL: config.baseUrl,
            timeout: config.timeoutMs,
            headers: {
                "X-Api-Key": config.apiKey,
            },
        });
    }

    private async request<S extends z.ZodTypeAny>(
        action: string,
        schema: S,
        send: (client: AxiosInstance) => Promise<{ data: unknown }>
    ): Promise<z.infer<S>> {
        let data: unknown;
        try {
            const response = await this.limiter.execute("lidarr", () => send(this.client));
            data = response.data;
        } catch (error) {
            throw toLidarrError(error, action);
        }

        const parsed = schema.safeParse(data);
        if (!parsed.success) {
            throw new LidarrApiError(`${action} returned an unexpected payload`, undefined, undefined, {
                action,
                issues: parsed.error.errors.map((issue) => issue.message),
            });
        }
        return parsed.data;
    }

    async listArtists(): Promise<LidarrArtist[]> {
        return this.request("List artists", z.array(artistSchema), (client) =>
            client.get("/api/v1/artist")
        );
    }

    async lookupArtist(mbid: string): Promise<LidarrArtistLookup[]> {
        return this.request("Artist lookup", z.array(artistLookupSchema), (client) =>
            client.get("/api/v1/artist/lookup", {
                params: { term: `lidarr:${mbid}` },
            })
        );
    }

    /**
     * Adds an artist from a lookup result with the configured profiles and
     * root folder. Album monitoring is left to the caller.
     */
    async addArtist(
        lookup: LidarrArtistLookup,
        options: AddArtistOptions = {}
    ): Promise<LidarrArtist> {
        const searchForMissingAlbums = options.searchForMissingAlbums ?? false;
        logger.debug(`Adding artist ${lookup.artistName} (${lookup.foreignArtistId})`);

        return this.request("Add artist", artistSchema, (client) =>
            client.post("/api/v1/artist", {
                ...lookup,
                qualityProfileId: this.config.qualityProfileId,
                metadataProfileId: this.config.metadataProfileId,
                rootFolderPath: this.config.rootFolderPath,
                monitored: options.monitored ?? false,
                addOptions: { searchForMissingAlbums },
            })
        );
    }

    async listAlbums(artistId: number): Promise<LidarrAlbum[]> {
        return this.request("List albums", z.array(albumSchema), (client) =>
            client.get("/api/v1/album", { params: { artistId } })
        );
    }

    async lookupAlbum(releaseGroupId: string): Promise<LidarrAlbumLookup[]> {
        return this.request("Album lookup", z.array(albumLookupSchema), (client) =>
            client.get("/api/v1/album/lookup", {
                params: { term: `lidarr:${releaseGroupId}` },
            })
        );
    }

    /**
     * POSTs a looked-up album. Lidarr may accept the album before it has an
     * id, so the returned lookup's `id` can be missing.
     */
    async addAlbum(
        lookup: LidarrAlbumLookup,
        artist: LidarrArtist,
        options: AddAlbumOptions = {}
    ): Promise<LidarrAlbumLookup> {
        return this.request("Add album", albumLookupSchema, (client) =>
            client.post("/api/v1/album", {
                ...lookup,
                artistId: artist.id,
                artist: { ...lookup.artist, ...artist },
                monitored: options.monitored ?? true,
                addOptions: {
                    searchForMissingAlbums: options.searchForMissingAlbums ?? true,
                },
            })
        );
    }

    async setAlbumMonitored(album: LidarrAlbum, monitored: boolean): Promise<LidarrAlbum> {
        return this.request("Update album", albumSchema, (client) =>
            client.put(`/api/v1/album/${album.id}`, { ...album, monitored })
        );
    }

    async runCommand(
        name: LidarrCommandName,
        body: Record<string, unknown> = {}
    ): Promise<LidarrCommand> {
        logger.debug(`Queueing ${name}`, body);
        return this.request(`${name} command`, commandSchema, (client) =>
            client.post("/api/v1/command", { name, ...body })
        );
    }
}
