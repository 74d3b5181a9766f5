import { describe, it, expect } from "vitest";
import { escapeLike, isWildcard, normalizeQuery, normalizeTopic } from "../topics.js";
import { MemoryStoreError } from "../errors.js";

describe("topics", () => {
  describe("normalizeTopic", () => {
    it("trims surrounding whitespace", () => {
      expect(normalizeTopic("  comm_style\n")).toBe("comm_style");
    });

    it("rejects non-strings", () => {
      expect(() => normalizeTopic(42)).toThrow("topic must be a string");
    });

    it("rejects empty topics with INVALID_INPUT", () => {
      let caught: unknown;
      try {
        normalizeTopic("\t ");
      } catch (err) {
        caught = err;
      }
      expect(caught).toBeInstanceOf(MemoryStoreError);
      expect(caught instanceof MemoryStoreError && caught.code).toBe("INVALID_INPUT");
    });
  });

  describe("normalizeQuery", () => {
    it("keeps the wildcard recognisable after trimming", () => {
      const q = normalizeQuery("  *  ");
      expect(q).toBe("*");
      expect(isWildcard(q)).toBe(true);
    });

    it("does not treat other queries as the wildcard", () => {
      expect(isWildcard(normalizeQuery("**"))).toBe(false);
    });

    it("rejects an empty query", () => {
      expect(() => normalizeQuery("")).toThrow(
        'query must not be empty (use "*" for all memories)',
      );
    });
  });

  describe("escapeLike", () => {
    it("escapes percent, underscore and backslash", () => {
      expect(escapeLike("100%_a\\b")).toBe("100\\%\\_a\\\\b");
    });

    it("leaves ordinary text alone", () => {
      expect(escapeLike("tech stack")).toBe("tech stack");
    });
  });
});
