import { MusicBrainzConfig } from "../../config";
import { MusicBrainzApiError } from "../../utils/errors";
import { ReleaseGroupCandidate, MusicBrainzService, escapeLucene, rankReleaseGroups } from "../musicbrainz";
import { RateLimitConfig, RateLimiter } from "../rateLimiter";

const mockClient = { get: jest.fn() };
const mockCreate = jest.fn();

jest.mock("axios", () => ({
    __esModule: true,
    default: {
        create: (options: unknown) => {
            mockCreate(options);
            return mockClient;
        },
    },
}));

jest.mock("../../utils/logger", () => ({
    createLogger: () => ({
        debug: jest.fn(),
        info: jest.fn(),
        warn: jest.fn(),
        error: jest.fn(),
        child: jest.fn(),
    }),
}));

const CONFIG: MusicBrainzConfig = {
    delayMs: 1000,
    timeoutMs: 5000,
    userAgent: "album-import-pipeline/test ( test@example.com )",
};

const NO_PACING: RateLimitConfig = {
    intervalCap: Infinity,
    interval: 0,
    concurrency: 1,
    maxRetries: 0,
    baseDelay: 1,
    maxJitter: 0,
};

interface SearchResponses {
    artists?: unknown[];
    releaseGroups?: (query: string) => unknown[];
}

function respondWith({ artists = [], releaseGroups = () => [] }: SearchResponses): void {
    mockClient.get.mockImplementation(async (url: string, options: { params: { query: string } }) => {
        if (url === "/artist") {
            return { data: { artists } };
        }
        return { data: { "release-groups": releaseGroups(options.params.query) } };
    });
}

const DRAKE = { id: "artist-1", name: "Drake", score: 100 };
const VIEWS = {
    id: "rg-1",
    title: "Views",
    score: 100,
    "artist-credit": [{ name: "Drake", artist: { id: "artist-1", name: "Drake" } }],
};

describe("MusicBrainzService", () => {
    let service: MusicBrainzService;

    beforeEach(() => {
        const limiter = new RateLimiter({ musicbrainz: NO_PACING, lidarr: NO_PACING }, async () => {});
        service = new MusicBrainzService(CONFIG, limiter);
    });

    it("identifies itself with the configured user agent", () => {
        expect(mockCreate).toHaveBeenCalledWith({
            baseURL: "https://musicbrainz.org/ws/2",
            timeout: 5000,
            headers: {
                "User-Agent": "album-import-pipeline/test ( test@example.com )",
                Accept: "application/json",
            },
        });
    });

    it("resolves artist and release group ids", async () => {
        respondWith({
            artists: [DRAKE, { id: "artist-2", name: "Drake Bell", score: 80 }],
            releaseGroups: (query) => (query === 'arid:artist-1 AND releasegroup:"Views"' ? [VIEWS] : []),
        });

        await expect(service.lookup("Drake", "Views")).resolves.toEqual({
            kind: "found",
            mbArtistId: "artist-1",
            mbReleaseId: "rg-1",
            matchedTitle: "Views",
            score: 100,
        });
        expect(mockClient.get).toHaveBeenCalledWith("/artist", {
            params: { query: 'artist:"Drake"', limit: 5, fmt: "json" },
        });
    });

    it("drops artist candidates with dissimilar names", async () => {
        respondWith({ artists: [DRAKE, { id: "artist-2", name: "Drake Bell", score: 80 }] });

        const candidates = await service.searchArtists("Drake");

        expect(candidates.map((candidate) => candidate.id)).toEqual(["artist-1"]);
        expect(candidates[0]).toMatchObject({ similarity: 100, quoted: true });
    });

    it("ignores release groups credited to other artists", async () => {
        respondWith({
            artists: [DRAKE],
            releaseGroups: () => [
                { ...VIEWS, id: "rg-2", "artist-credit": [{ name: "Somebody Else" }] },
            ],
        });

        await expect(service.lookup("Drake", "Views")).resolves.toEqual({
            kind: "album_not_found",
            mbArtistId: "artist-1",
        });
    });

    it("reports an unknown artist", async () => {
        respondWith({});

        await expect(service.lookup("Nobody Known", "Nothing")).resolves.toEqual({
            kind: "artist_not_found",
        });
    });

    it("fails when no query can be answered", async () => {
        mockClient.get.mockRejectedValue(
            Object.assign(new Error("Request failed with status code 503"), {
                response: { status: 503, data: {}, headers: {} },
            })
        );

        const failure = service.lookup("Drake", "Views");

        await expect(failure).rejects.toBeInstanceOf(MusicBrainzApiError);
        await expect(failure).rejects.toMatchObject({ status: 503 });
    });
});

describe("escapeLucene", () => {
    it("escapes query syntax characters", () => {
        expect(escapeLucene("AC/DC")).toBe("AC\\/DC");
        expect(escapeLucene("What's Going On?")).toBe("What's Going On\\?");
        expect(escapeLucene("Tyler, The Creator")).toBe("Tyler, The Creator");
    });
});

describe("rankReleaseGroups", () => {
    function candidate(id: string, title: string, score: number): ReleaseGroupCandidate {
        return { id, title, score, creditPhrase: "Artist" };
    }

    it("puts exact titles first, by score", () => {
        const ranked = rankReleaseGroups("Views", [
            candidate("a", "Views (Live)", 100),
            candidate("b", "Views", 80),
            candidate("c", "views", 90),
        ]);

        expect(ranked.map((rg) => rg.id)).toEqual(["c", "b"]);
    });

    it("only accepts the requested volume", () => {
        const ranked = rankReleaseGroups("Greatest Hits Volume 2", [
            candidate("one", "Greatest Hits Vol. 1", 100),
            candidate("two", "Greatest Hits Vol. 2", 90),
        ]);

        expect(ranked.map((rg) => rg.id)).toEqual(["two"]);
    });
});
