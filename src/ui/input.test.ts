import { describe, expect, it } from "vitest";
import { parseSelection, parseVolume, parseWholeNumber } from "./input";

describe("parseWholeNumber", () => {
	it("accepts digits with surrounding whitespace", () => {
		expect(parseWholeNumber("42")).toBe(42);
		expect(parseWholeNumber(" 7 ")).toBe(7);
	});

	it("rejects signs, decimals and blanks", () => {
		expect(parseWholeNumber("-1")).toBeNull();
		expect(parseWholeNumber("+1")).toBeNull();
		expect(parseWholeNumber("1.5")).toBeNull();
		expect(parseWholeNumber("")).toBeNull();
		expect(parseWholeNumber("ten")).toBeNull();
	});
});

describe("parseSelection", () => {
	it("converts a 1-based choice to an index", () => {
		expect(parseSelection("1", 3)).toBe(0);
		expect(parseSelection("3", 3)).toBe(2);
	});

	it("treats 0, out-of-range and non-numeric input as going back", () => {
		expect(parseSelection("0", 3)).toBeNull();
		expect(parseSelection("4", 3)).toBeNull();
		expect(parseSelection("x", 3)).toBeNull();
		expect(parseSelection("", 3)).toBeNull();
	});
});

describe("parseVolume", () => {
	it("accepts the inclusive range", () => {
		expect(parseVolume("0")).toBe(0);
		expect(parseVolume("100")).toBe(100);
		expect(parseVolume(" 35 ")).toBe(35);
	});

	it("rejects values outside the range or not whole", () => {
		expect(parseVolume("101")).toBeNull();
		expect(parseVolume("-5")).toBeNull();
		expect(parseVolume("50.5")).toBeNull();
		expect(parseVolume("loud")).toBeNull();
	});
});
