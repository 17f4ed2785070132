import { detectColumnOrder, detectFormat, sampleLines } from "../formatDetector";

describe("detectFormat", () => {
    it("recognizes Spotify exports by their track and artist columns", () => {
        expect(detectFormat(["Track Name,Artist Name(s),Album Name"])).toBe("spotify_csv");
        expect(
            detectFormat([
                "Track URI,Track Name,Artist URI(s),Artist Name(s),Album URI,Album Name,Album Artist Name(s),Album Release Date",
            ])
        ).toBe("spotify_csv");
    });

    it("recognizes artist/album headers in either order and delimiter", () => {
        expect(detectFormat(["Album,Artist", "Views,Drake"])).toBe("simple_csv_headered");
        expect(detectFormat(["artist\talbum", "Drake\tViews"])).toBe("simple_csv_headered");
        expect(detectFormat(["Band,Record,Year"])).toBe("simple_csv_headered");
    });

    it("recognizes headerless two-column CSV", () => {
        expect(detectFormat(["Drake,Views", "Kendrick Lamar,DAMN."])).toBe("simple_csv_headerless");
    });

    it("does not let titles containing 'by' outvote the CSV layout", () => {
        expect(detectFormat(["Ben E. King,Stand By Me", "Drake,Views", "Future,HNDRXX"])).toBe(
            "simple_csv_headerless"
        );
        expect(
            detectFormat(["Stand By Me,Ben E. King", "Bitten By The Moon,Drake", "Views,Drake"])
        ).toBe("simple_csv_headerless");
    });

    it("recognizes dash, by and tab separated text", () => {
        expect(detectFormat(["Kendrick Lamar - DAMN.", "Drake - Views", "Drake - Views"])).toBe(
            "text_dash"
        );
        expect(detectFormat(["Views by Drake", "DAMN. by Kendrick Lamar"])).toBe("text_by");
        expect(detectFormat(["Drake\tViews", "Future\tHNDRXX"])).toBe("tsv");
    });

    it("needs at least half of the sample to agree", () => {
        expect(detectFormat(["Drake - Views", "just words", "more words"])).toBe("unknown");
        expect(detectFormat(["Drake - Views", "just words"])).toBe("text_dash");
    });

    it("falls back to unknown", () => {
        expect(detectFormat(["just some words", "another line"])).toBe("unknown");
        expect(detectFormat([])).toBe("unknown");
        expect(detectFormat(["   ", ""])).toBe("unknown");
    });

    it("is deterministic for the same sample", () => {
        const sample = ["Drake - Views", "Views by Drake", "Drake\tViews", "Drake,Views"];
        const first = detectFormat(sample);

        for (let i = 0; i < 5; i++) {
            expect(detectFormat([...sample])).toBe(first);
        }
    });
});

describe("detectColumnOrder", () => {
    it("treats the column with repeated values as the artist", () => {
        expect(detectColumnOrder(["Drake,Views", "Drake,Take Care", "Future,HNDRXX"])).toBe(
            "artist_album"
        );
        expect(detectColumnOrder(["Views,Drake", "Take Care,Drake", "HNDRXX,Future"])).toBe(
            "album_artist"
        );
    });

    it("uses album markers when repeats tie", () => {
        expect(detectColumnOrder(["DAMN. (Deluxe),Kendrick Lamar", "Views 2016,Drake"])).toBe(
            "album_artist"
        );
    });

    it("defaults to artist,album", () => {
        expect(detectColumnOrder(["Drake,Views", "Future,HNDRXX"])).toBe("artist_album");
        expect(detectColumnOrder([])).toBe("artist_album");
    });
});

describe("sampleLines", () => {
    it("drops a BOM and blank lines and honors the limit", () => {
        const bom = String.fromCharCode(0xfeff);

        expect(sampleLines(`${bom}a\n\nb\r\nc`, 2)).toEqual(["a", "b"]);
        expect(sampleLines("a\n  \nb")).toEqual(["a", "b"]);
    });
});
