import {
    cleanText,
    decensorProfanity,
    getAlbumTitleVariations,
    normalize,
    normalizeAlbumTitleForMatching,
    normalizeForComparison,
    stripAlbumSuffixes,
} from "../textNormalizer";

const ZERO_WIDTH_SPACE = String.fromCharCode(0x200b);
const BOM = String.fromCharCode(0xfeff);
const SOFT_HYPHEN = String.fromCharCode(0xad);
const RIGHT_SINGLE_QUOTE = String.fromCharCode(0x2019);
const LEFT_DOUBLE_QUOTE = String.fromCharCode(0x201c);
const RIGHT_DOUBLE_QUOTE = String.fromCharCode(0x201d);
const FULLWIDTH_A = String.fromCharCode(0xff21);
const BELL = String.fromCharCode(0x07);

describe("normalize", () => {
    it("trims and collapses whitespace", () => {
        expect(normalize("  Kendrick \t  Lamar  ", "artist")).toBe("Kendrick Lamar");
    });

    it("removes invisible and control characters", () => {
        expect(normalize(`${BOM}Dra${ZERO_WIDTH_SPACE}ke`, "artist")).toBe("Drake");
        expect(normalize(`Sza${SOFT_HYPHEN}`, "artist")).toBe("Sza");
        expect(normalize(`Dr${BELL}ake`, "artist")).toBe("Drake");
    });

    it("maps typographic quotes and backticks to ASCII", () => {
        expect(normalize(`Don${RIGHT_SINGLE_QUOTE}t Stop`, "album")).toBe("Don't Stop");
        expect(normalize("Rock `n Roll", "album")).toBe("Rock 'n Roll");
        expect(normalize(`${LEFT_DOUBLE_QUOTE}Heroes${RIGHT_DOUBLE_QUOTE}`, "album")).toBe('"Heroes"');
    });

    it("applies NFKC compatibility folding", () => {
        expect(normalize(`${FULLWIDTH_A}BC`, "artist")).toBe("ABC");
    });

    it("returns an empty string for whitespace-only input", () => {
        expect(normalize("  \t \n ", "artist")).toBe("");
        expect(normalize(ZERO_WIDTH_SPACE, "album")).toBe("");
    });

    it("strips edition markers only for albums", () => {
        expect(normalize("DAMN. (Deluxe Edition)", "album")).toBe("DAMN.");
        expect(normalize("DAMN. (Deluxe Edition)", "artist")).toBe("DAMN. (Deluxe Edition)");
    });

    it("is idempotent", () => {
        const samples = [
            "  Views   - EP ",
            "Album (Deluxe) [Explicit]",
            `F*CK${ZERO_WIDTH_SPACE} it (feat. Someone)`,
            "Title (Deluxe) - Single",
            "sh*t   happens",
            "EP",
        ];
        for (const sample of samples) {
            for (const role of ["artist", "album"] as const) {
                const once = normalize(sample, role);
                expect(normalize(once, role)).toBe(once);
            }
        }
    });
});

describe("stripAlbumSuffixes", () => {
    it("strips EP and Single markers", () => {
        expect(stripAlbumSuffixes("Views - EP")).toBe("Views");
        expect(stripAlbumSuffixes("Views EP")).toBe("Views");
        expect(stripAlbumSuffixes("Hotline Bling - Single")).toBe("Hotline Bling");
        expect(stripAlbumSuffixes("Hotline Bling Single")).toBe("Hotline Bling");
        expect(normalize("Hotline Bling Single", "album")).toBe("Hotline Bling");
    });

    it("strips featuring, collaboration and edition parentheticals", () => {
        expect(stripAlbumSuffixes("Song (feat. Rihanna)")).toBe("Song");
        expect(stripAlbumSuffixes("Song (with Future)")).toBe("Song");
        expect(stripAlbumSuffixes("Song (A & B)")).toBe("Song");
        expect(stripAlbumSuffixes("Album (Remastered 2011)")).toBe("Album");
        expect(stripAlbumSuffixes("Album (Collector's Edition)")).toBe("Album");
        expect(stripAlbumSuffixes("Album (10th Anniversary Edition)")).toBe(
            "Album (10th Anniversary Edition)"
        );
        expect(stripAlbumSuffixes("Album (Anniversary Edition)")).toBe("Album");
    });

    it("repeats until nothing changes", () => {
        expect(stripAlbumSuffixes("Album (Deluxe) [Explicit]")).toBe("Album");
        expect(stripAlbumSuffixes("Title (Deluxe) - EP")).toBe("Title");
    });

    it("never strips a title down to nothing", () => {
        expect(stripAlbumSuffixes("EP")).toBe("EP");
        expect(stripAlbumSuffixes("[Explicit]")).toBe("[Explicit]");
    });
});

describe("decensorProfanity", () => {
    it("keeps the case pattern of the censored word", () => {
        expect(decensorProfanity("F*ck Love")).toBe("Fuck Love");
        expect(decensorProfanity("SH*T")).toBe("SHIT");
        expect(decensorProfanity("b_tch better have my money")).toBe("bitch better have my money");
        expect(decensorProfanity("D-mn")).toBe("Damn");
    });

    it("leaves clean text alone", () => {
        expect(decensorProfanity("Hello World")).toBe("Hello World");
    });
});

describe("cleanText", () => {
    it("keeps edition markers", () => {
        expect(cleanText("  DAMN.  (Deluxe Edition) ")).toBe("DAMN. (Deluxe Edition)");
    });
});

describe("comparison helpers", () => {
    it("normalizes names for comparison", () => {
        expect(normalizeForComparison("Ol' Burger Beats")).toBe("ol burger beats");
        expect(normalizeForComparison("Beyoncé")).toBe("beyonce");
        expect(normalizeForComparison("[bsd.u]")).toBe("[bsdu]");
    });

    it("removes one known edition variant for matching", () => {
        expect(normalizeAlbumTitleForMatching("DAMN. (Deluxe Edition)")).toBe("damn.");
        expect(normalizeAlbumTitleForMatching("Abbey Road [Remastered]")).toBe("abbey road");
        expect(normalizeAlbumTitleForMatching("Views")).toBe("views");
    });

    it("lists original, decensored and stripped title variations", () => {
        expect(getAlbumTitleVariations("F*ck Love (Deluxe)")).toEqual([
            "F*ck Love (Deluxe)",
            "Fuck Love (Deluxe)",
            "F*ck Love",
            "Fuck Love",
        ]);
        expect(getAlbumTitleVariations("Views")).toEqual(["Views"]);
    });
});
