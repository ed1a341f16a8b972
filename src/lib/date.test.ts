import { describe, expect, it } from "vitest";
import { formatReleaseDate } from "./date";

describe("formatReleaseDate", () => {
	it("formats the local calendar day", () => {
		expect(formatReleaseDate(new Date(2024, 4, 1, 23, 59))).toBe("2024-05-01");
	});

	it("pads month and day", () => {
		expect(formatReleaseDate(new Date(2024, 0, 9))).toBe("2024-01-09");
	});
});
