import { albumSimilarity, dedupe } from "../deduplicator";
import { AlbumEntry, createEntry } from "../types";

function entry(artist: string, album: string, extra: Partial<AlbumEntry> = {}): AlbumEntry {
    return createEntry(artist, album, "text_dash", extra);
}

describe("dedupe", () => {
    it("merges exact duplicates and sums their counts", () => {
        const result = dedupe([entry("Drake", "Views"), entry("Drake", "Views")]);

        expect(result.entries).toHaveLength(1);
        expect(result.entries[0]?.trackCount).toBe(2);
        expect(result.stats).toEqual({ exact: 1, fuzzy: 0, dropped: 0 });
    });

    it("merges edition variants into the first-seen entry", () => {
        const result = dedupe([
            entry("Kendrick Lamar", "DAMN."),
            entry("Kendrick Lamar", "DAMN. (Deluxe Edition)"),
        ]);

        expect(result.entries).toHaveLength(1);
        expect(result.entries[0]).toMatchObject({ album: "DAMN.", trackCount: 2 });
        expect(result.entries[0]?.matchingRisk).toBeUndefined();
        expect(result.stats.fuzzy).toBe(1);
    });

    it("keeps the edition marker in the album and strips it for searching", () => {
        const [only] = dedupe([entry("Kendrick Lamar", "DAMN. (Deluxe Edition)")]).entries;

        expect(only).toMatchObject({ album: "DAMN. (Deluxe Edition)", albumSearch: "DAMN." });
    });

    it("disables fuzzy merging at threshold 100", () => {
        const input = () => [entry("Drake", "Views"), entry("Drake", "views")];

        expect(dedupe(input()).entries).toHaveLength(1);
        expect(dedupe(input(), { fuzzyThreshold: 100 }).entries).toHaveLength(2);
    });

    it("merges every title of an artist at threshold 0", () => {
        const result = dedupe([entry("Drake", "Abc"), entry("Drake", "Xyz")], { fuzzyThreshold: 0 });

        expect(result.entries.map((item) => item.album)).toEqual(["Abc"]);
        expect(result.stats.fuzzy).toBe(1);
    });

    it("flags merges below the confident score", () => {
        const result = dedupe([entry("Drake", "Views"), entry("Drake", "Viewz")], {
            fuzzyThreshold: 80,
        });

        expect(result.entries).toHaveLength(1);
        expect(result.entries[0]).toMatchObject({
            matchingRisk: true,
            riskReason: "Low fuzzy match: 80",
        });
    });

    it("does not merge below the threshold", () => {
        expect(dedupe([entry("Drake", "Views"), entry("Drake", "Viewz")]).entries).toHaveLength(2);
    });

    it("never merges albums of different artists", () => {
        const result = dedupe([entry("Drake", "Views"), entry("Future", "Views")]);

        expect(result.entries.map((item) => item.artist)).toEqual(["Drake", "Future"]);
    });

    it("clusters artists that differ only in diacritics", () => {
        const accented = `Beyonc${String.fromCharCode(0xe9)}`;

        const result = dedupe([entry(accented, "Lemonade"), entry("Beyonce", "Lemonade")]);

        expect(result.entries).toHaveLength(1);
        expect(result.entries[0]?.artist).toBe(accented);
    });

    it("drops entries that are empty after normalization", () => {
        const result = dedupe([entry(String.fromCharCode(0x200b), "Views"), entry("Drake", "Views")]);

        expect(result.entries).toHaveLength(1);
        expect(result.stats.dropped).toBe(1);
    });

    it("compares raw text when normalization is off", () => {
        const input = () => [entry(" Drake ", "Views"), entry("Drake", "Views")];

        expect(dedupe(input(), { normalize: false, fuzzyThreshold: 100 }).entries.map((e) => e.artist)).toEqual([
            " Drake ",
            "Drake",
        ]);
        expect(dedupe(input(), { fuzzyThreshold: 100 }).entries).toHaveLength(1);
    });

    it("keeps input order and fills gaps from duplicates", () => {
        const result = dedupe([
            entry("Drake", "Views"),
            entry("Future", "HNDRXX"),
            entry("Drake", "Views", { year: "2016" }),
        ]);

        expect(result.entries.map((item) => [item.artist, item.album, item.year])).toEqual([
            ["Drake", "Views", "2016"],
            ["Future", "HNDRXX", undefined],
        ]);
    });

    it("never yields more entries at a lower threshold", () => {
        const input = () => [
            entry("Drake", "Views"),
            entry("Drake", "Viewz"),
            entry("Drake", "Take Care"),
            entry("Drake", "Take Care (Deluxe)"),
        ];

        const strict = dedupe(input(), { fuzzyThreshold: 100 }).entries.length;
        const normal = dedupe(input(), { fuzzyThreshold: 85 }).entries.length;
        const loose = dedupe(input(), { fuzzyThreshold: 70 }).entries.length;

        expect(strict).toBeGreaterThanOrEqual(normal);
        expect(normal).toBeGreaterThanOrEqual(loose);
    });
});

describe("albumSimilarity", () => {
    it("scores edition variants as identical", () => {
        expect(
            albumSimilarity(entry("Drake", "Take Care"), entry("Drake", "Take Care (Deluxe Edition)"))
        ).toBe(100);
    });
});
