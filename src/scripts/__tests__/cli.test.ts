import * as fs from "fs/promises";
import * as os from "os";
import * as path from "path";
import { main as importMain, parseArgs as parseImportArgs } from "../importAlbums";
import { main as parseMain, parseArgs as parseParseArgs } from "../parseAlbums";

jest.mock("../../utils/logger", () => ({
    ...jest.requireActual<typeof import("../../utils/logger")>("../../utils/logger"),
    createLogger: () => ({
        debug: jest.fn(),
        info: jest.fn(),
        warn: jest.fn(),
        error: jest.fn(),
        child: jest.fn(),
    }),
    setLogLevel: jest.fn(),
    attachLogFile: jest.fn(),
}));

describe("parse-albums arguments", () => {
    it("applies defaults", () => {
        expect(parseParseArgs(["list.txt"])).toEqual({
            input: "list.txt",
            output: "albums.csv",
            dryRun: false,
            fuzzyThreshold: 85,
            normalize: true,
            minArtistSongs: 3,
            minAlbumSongs: 2,
            verbose: false,
            includeRiskInfo: false,
            skipRisky: false,
            enrichMusicBrainz: true,
        });
    });

    it("reads every option", () => {
        const args = parseParseArgs([
            "export.csv",
            "-o",
            "out.csv",
            "--dry-run",
            "--fuzzy-threshold",
            "90",
            "--no-normalize",
            "--min-artist-songs",
            "1",
            "--min-album-songs",
            "0",
            "--max-items",
            "10",
            "--artist",
            "drake",
            "--album",
            "views",
            "--include-risk-info",
            "--skip-risky",
            "--no-enrich-musicbrainz",
            "--mb-delay",
            "1.5",
            "-v",
        ]);

        expect(args).toEqual({
            input: "export.csv",
            output: "out.csv",
            dryRun: true,
            fuzzyThreshold: 90,
            normalize: false,
            minArtistSongs: 1,
            minAlbumSongs: 0,
            verbose: true,
            maxItems: 10,
            artist: "drake",
            album: "views",
            includeRiskInfo: true,
            skipRisky: true,
            enrichMusicBrainz: false,
            mbDelay: 1.5,
        });
    });

    it("rejects bad input", () => {
        expect(() => parseParseArgs([])).toThrow("Missing input file");
        expect(() => parseParseArgs(["a.txt", "b.txt"])).toThrow("Unexpected argument: b.txt");
        expect(() => parseParseArgs(["a.txt", "--bogus"])).toThrow("Unknown option: --bogus");
        expect(() => parseParseArgs(["a.txt", "-o"])).toThrow("Missing value for -o");
        expect(() => parseParseArgs(["a.txt", "--artist", "--dry-run"])).toThrow("Missing value for --artist");
        expect(() => parseParseArgs(["a.txt", "--fuzzy-threshold", "101"])).toThrow(
            "Invalid value for --fuzzy-threshold: 101 (expected 0-100)"
        );
        expect(() => parseParseArgs(["a.txt", "--min-album-songs", "1.5"])).toThrow(
            "Invalid value for --min-album-songs: 1.5"
        );
    });
});

describe("import-albums arguments", () => {
    it("applies defaults", () => {
        expect(parseImportArgs(["albums.csv"])).toEqual({
            csvPath: "albums.csv",
            dryRun: false,
            skipExisting: false,
            noSkipCompleted: false,
            noBatchPause: false,
            verbose: false,
        });
    });

    it("reads every option", () => {
        expect(
            parseImportArgs([
                "--status",
                "failed,new",
                "albums.csv",
                "--not-status",
                "skip",
                "--dry-run",
                "--max-items",
                "0",
                "--skip-existing",
                "--no-skip-completed",
                "--batch-size",
                "5",
                "--no-batch-pause",
                "--progress-interval",
                "10",
                "--log-file",
                "import.log",
                "--artist",
                "Drake",
                "--album",
                "Views",
                "--verbose",
            ])
        ).toEqual({
            csvPath: "albums.csv",
            status: "failed,new",
            notStatus: "skip",
            dryRun: true,
            maxItems: 0,
            skipExisting: true,
            noSkipCompleted: true,
            batchSize: 5,
            noBatchPause: true,
            progressInterval: 10,
            logFile: "import.log",
            artist: "Drake",
            album: "Views",
            verbose: true,
        });
    });

    it("rejects bad input", () => {
        expect(() => parseImportArgs([])).toThrow("Missing CSV path");
        expect(() => parseImportArgs(["a.csv", "--batch-size", "0"])).toThrow("Invalid value for --batch-size: 0");
        expect(() => parseImportArgs(["a.csv", "--max-items", "-1"])).toThrow("Invalid value for --max-items: -1");
        expect(() => parseImportArgs(["a.csv", "-x"])).toThrow("Unknown option: -x");
    });
});

describe("main", () => {
    let dir: string;
    let consoleLog: jest.SpyInstance;
    let consoleError: jest.SpyInstance;
    const savedApiKey = process.env.LIDARR_API_KEY;

    beforeEach(async () => {
        dir = await fs.mkdtemp(path.join(os.tmpdir(), "cli-"));
        consoleLog = jest.spyOn(console, "log").mockImplementation(() => {});
        consoleError = jest.spyOn(console, "error").mockImplementation(() => {});
    });

    afterEach(async () => {
        jest.restoreAllMocks();
        if (savedApiKey === undefined) {
            delete process.env.LIDARR_API_KEY;
        } else {
            process.env.LIDARR_API_KEY = savedApiKey;
        }
        await fs.rm(dir, { recursive: true, force: true });
    });

    it("parses a list without MusicBrainz lookups", async () => {
        const input = path.join(dir, "list.txt");
        const output = path.join(dir, "albums.csv");
        await fs.writeFile(input, "Drake - Views\nFuture - HNDRXX\n", "utf-8");

        await expect(parseMain([input, "-o", output, "--no-enrich-musicbrainz"])).resolves.toBe(0);

        await expect(fs.readFile(output, "utf-8")).resolves.toBe(
            "row_id,artist,album,status\nr00001,Drake,Views,\nr00002,Future,HNDRXX,\n"
        );
        expect(consoleLog).toHaveBeenCalledWith("Written:               2");
    });

    it("prints usage for invalid arguments", async () => {
        await expect(parseMain(["--nope"])).resolves.toBe(1);

        expect(consoleError).toHaveBeenCalledWith("Unknown option: --nope");
    });

    it("fails a missing input file", async () => {
        await expect(
            parseMain([path.join(dir, "missing.txt"), "--no-enrich-musicbrainz", "--dry-run"])
        ).resolves.toBe(1);
    });

    it("refuses to import without an API key", async () => {
        delete process.env.LIDARR_API_KEY;
        const csv = path.join(dir, "albums.csv");
        await fs.writeFile(csv, "artist,album,mb_artist_id,mb_release_id\nDrake,Views,mb-1,rg-1\n", "utf-8");

        await expect(importMain([csv])).resolves.toBe(1);
    });
});
