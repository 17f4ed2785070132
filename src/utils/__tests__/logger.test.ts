import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import {
    attachLogFile,
    createLogger,
    detachLogFile,
    getLogLevel,
    setLogLevel,
} from "../logger";

describe("logger", () => {
    const initialLevel = getLogLevel();
    let consoleDebug: jest.SpyInstance;
    let consoleInfo: jest.SpyInstance;
    let consoleWarn: jest.SpyInstance;
    let consoleError: jest.SpyInstance;

    beforeEach(() => {
        consoleDebug = jest.spyOn(console, "debug").mockImplementation(() => {});
        consoleInfo = jest.spyOn(console, "info").mockImplementation(() => {});
        consoleWarn = jest.spyOn(console, "warn").mockImplementation(() => {});
        consoleError = jest.spyOn(console, "error").mockImplementation(() => {});
    });

    afterEach(() => {
        detachLogFile();
        setLogLevel(initialLevel);
        jest.restoreAllMocks();
    });

    it("gates output by level", () => {
        setLogLevel("warn");
        const log = createLogger("Importer");

        log.debug("d");
        log.info("i");
        log.warn("careful");

        expect(consoleDebug).not.toHaveBeenCalled();
        expect(consoleInfo).not.toHaveBeenCalled();
        expect(consoleWarn).toHaveBeenCalledWith("[WARN] [Importer] careful");
    });

    it("prints nothing when silent", () => {
        setLogLevel("silent");

        createLogger().error("hidden");

        expect(consoleError).not.toHaveBeenCalled();
    });

    it("nests child scopes", () => {
        setLogLevel("debug");

        createLogger("Parser").child("Spotify").debug("rows");

        expect(consoleDebug).toHaveBeenCalledWith("[DEBUG] [Parser.Spotify] rows");
    });

    it("normalizes errors inside context objects", () => {
        setLogLevel("info");
        const error = new Error("boom");

        createLogger("Lidarr").error("Add failed", { artist: "Drake", error });

        expect(consoleError).toHaveBeenCalledWith("[ERROR] [Lidarr] Add failed", {
            artist: "Drake",
            error: { name: "Error", message: "boom", stack: error.stack },
        });
    });

    it("mirrors emitted lines to an attached log file", () => {
        setLogLevel("info");
        const dir = fs.mkdtempSync(path.join(os.tmpdir(), "logger-"));
        const file = path.join(dir, "run.log");

        try {
            attachLogFile(file);
            createLogger("Run").info("hello", { rows: 2 });
            createLogger("Run").debug("not written");
            detachLogFile();
            createLogger("Run").info("after detach");

            const lines = fs.readFileSync(file, "utf-8").trim().split("\n");
            expect(lines).toHaveLength(2);
            expect(lines[0]).toMatch(/^==== run started /);
            expect(lines[1]).toMatch(/^\S+ \[INFO\] \[Run\] hello \{"rows":2\}$/);
        } finally {
            fs.rmSync(dir, { recursive: true, force: true });
        }
    });
});
