/**
 * Contract: array helpers backing the emitter registry.
 *
 * Sections:
 *   1. find()
 *   2. append()
 *   3. removeAt()
 */
import { describe, expect, it, vi } from "vitest";
import { append, find, NOT_FOUND, removeAt } from "./array-ops";

describe("array-ops", () => {
    // -- 1. find() --
    describe("find()", () => {
        it("returns the index of the first occurrence", () => {
            expect(find(["a", "b", "a"], "a")).toBe(0);
            expect(find(["a", "b", "a"], "b")).toBe(1);
        });

        it("returns NOT_FOUND when the element is missing", () => {
            expect(find(["a", "b"], "c")).toBe(NOT_FOUND);
            expect(find([], "c")).toBe(-1);
        });

        it("starts the search at the offset", () => {
            expect(find(["a", "b", "a"], "a", 1)).toBe(2);
            expect(find(["a", "b", "a"], "a", 3)).toBe(NOT_FOUND);
        });

        it("clamps a negative offset to the start", () => {
            expect(find(["a", "b"], "a", -5)).toBe(0);
        });

        it("resuming past each hit walks every occurrence", () => {
            const source = ["x", "y", "x", "x", "z"];
            const hits: number[] = [];
            let index = find(source, "x");
            while (index !== NOT_FOUND) {
                hits.push(index);
                index = find(source, "x", index + 1);
            }
            expect(hits).toEqual([0, 2, 3]);
        });

        it("matches objects by identity by default", () => {
            const a = { id: 1 };
            expect(find([{ id: 1 }, a], a)).toBe(1);
        });

        it("uses the supplied equality", () => {
            const source = [{ id: 1 }, { id: 2 }];
            expect(find(source, { id: 2 }, 0, (x, y) => x.id === y.id)).toBe(1);
        });

        it("never matches a null or undefined target", () => {
            expect(find([null, "a"], null)).toBe(NOT_FOUND);
            expect(find([undefined, "a"], undefined)).toBe(NOT_FOUND);
        });

        it("skips absent positions without calling the equality", () => {
            const equals = vi.fn((x: string, y: string) => x === y);
            expect(find([null, undefined, "a"], "a", 0, equals)).toBe(2);
            expect(equals).toHaveBeenCalledOnce();
            expect(equals).toHaveBeenCalledWith("a", "a");
        });
    });

    // -- 2. append() --
    describe("append()", () => {
        it("returns a new array with the element last", () => {
            const source = [1, 2];
            const next = append(source, 3);
            expect(next).toEqual([1, 2, 3]);
            expect(next).not.toBe(source);
        });

        it("does not mutate the source", () => {
            const source = [1, 2];
            append(source, 3);
            expect(source).toEqual([1, 2]);
        });

        it("appends to an empty array", () => {
            expect(append([], "a")).toEqual(["a"]);
        });
    });

    // -- 3. removeAt() --
    describe("removeAt()", () => {
        it("drops the element at the index and keeps the rest in order", () => {
            expect(removeAt(["a", "b", "c", "d"], 1)).toEqual(["a", "c", "d"]);
            expect(removeAt(["a", "b", "c"], 0)).toEqual(["b", "c"]);
            expect(removeAt(["a", "b", "c"], 2)).toEqual(["a", "b"]);
        });

        it("removes only one of several equal elements", () => {
            expect(removeAt(["a", "a", "a"], 1)).toEqual(["a", "a"]);
        });

        it("does not mutate the source", () => {
            const source = ["a", "b"];
            const next = removeAt(source, 0);
            expect(source).toEqual(["a", "b"]);
            expect(next).not.toBe(source);
        });
    });
});
