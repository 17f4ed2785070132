import { guessDelimiter, normalizeHeader, parseCsvRows, parseCsvTable, splitCsvLine } from "../csvRows";

describe("parseCsvRows", () => {
    it("handles quotes, ragged rows and blank lines", () => {
        expect(parseCsvRows('artist,album\n"Tyler, The Creator",IGOR,2019\n\nDrake\n')).toEqual([
            ["artist", "album"],
            ["Tyler, The Creator", "IGOR", "2019"],
            ["Drake"],
        ]);
    });

    it("reads tab-delimited rows", () => {
        expect(parseCsvRows("Drake\tViews", "\t")).toEqual([["Drake", "Views"]]);
    });
});

describe("parseCsvTable", () => {
    it("keeps every cell of long rows", () => {
        expect(parseCsvTable("artist,album\nDrake,Views,2016,note\n")).toEqual([
            ["artist", "album"],
            ["Drake", "Views", "2016", "note"],
        ]);
    });

    it("throws on a record it cannot read", () => {
        expect(() => parseCsvTable('artist,album\nDrake,"Views\n')).toThrow();
    });
});

describe("splitCsvLine", () => {
    it("splits one line", () => {
        expect(splitCsvLine('"Earth, Wind & Fire",Spirit')).toEqual(["Earth, Wind & Fire", "Spirit"]);
    });
});

describe("guessDelimiter", () => {
    it("picks tabs only without commas", () => {
        expect(guessDelimiter("artist\talbum")).toBe("\t");
        expect(guessDelimiter("artist,album\tx")).toBe(",");
    });
});

describe("normalizeHeader", () => {
    it("unifies case, underscores and camel case", () => {
        expect(normalizeHeader("Artist_Name")).toBe("artist name");
        expect(normalizeHeader("artistName")).toBe("artist name");
        expect(normalizeHeader(" ARTIST  NAME ")).toBe("artist name");
    });
});
