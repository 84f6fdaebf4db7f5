import { describe, it, expect } from "vitest";
import {
  ALLOWED_TRANSITIONS,
  applyDepthGate,
  canTransition,
  stagesUpTo,
  validateTransition,
} from "../../src/domain/depth-state-machine";
import type { Depth, ScrapedRecord } from "../../src/domain/models";

const fullRecord: ScrapedRecord = {
  searchTerm: "ocean diversity",
  url: "https://a.example/1",
  platform: "reddit",
  title: "T",
  author: "A",
  date: "D",
  publisher: "P",
  rank: 1,
  excerpt: "E",
  summary: "S",
  hasComments: true,
  comments: [{ text: "c1", author: "u1", postedAt: "1h", likes: 3 }],
  scrapedAt: "2024-01-01T00:00:00.000Z",
  completedStage: 3,
};

const STAGE_FIELDS: Record<Depth, string[]> = {
  0: ["searchTerm", "url", "platform", "rank", "scrapedAt", "hasComments", "comments", "completedStage"],
  1: ["title", "author", "date", "publisher", "excerpt", "summary"],
  2: [],
  3: [],
};

describe("Depth state machine", () => {
  describe("canTransition", () => {
    it("should only allow moving to the next stage", () => {
      expect(canTransition(0, 1)).toBe(true);
      expect(canTransition(1, 2)).toBe(true);
      expect(canTransition(2, 3)).toBe(true);
    });

    it("should reject skips, reversals and leaving the last stage", () => {
      expect(canTransition(0, 2)).toBe(false);
      expect(canTransition(2, 1)).toBe(false);
      expect(canTransition(3, 0)).toBe(false);
    });
  });

  describe("validateTransition", () => {
    it("should name the stages in the error", () => {
      expect(() => validateTransition(1, 3)).toThrow("METADATA -> DISCUSSION_META");
      expect(() => validateTransition(0, 1)).not.toThrow();
    });
  });

  describe("ALLOWED_TRANSITIONS", () => {
    it("should cover every stage", () => {
      for (const stage of [0, 1, 2, 3] as const) {
        expect(ALLOWED_TRANSITIONS.has(stage)).toBe(true);
      }
    });
  });

  describe("stagesUpTo", () => {
    it("should always start at LINKS_ONLY and never skip a stage", () => {
      expect(stagesUpTo(0)).toEqual([0]);
      expect(stagesUpTo(2)).toEqual([0, 1, 2]);
      expect(stagesUpTo(3)).toEqual([0, 1, 2, 3]);
    });
  });

  describe("applyDepthGate", () => {
    it("should keep only link fields at stage 0", () => {
      expect(applyDepthGate(fullRecord, 0)).toEqual({
        searchTerm: "ocean diversity",
        url: "https://a.example/1",
        platform: "reddit",
        rank: 1,
        scrapedAt: "2024-01-01T00:00:00.000Z",
        hasComments: false,
        comments: [],
        completedStage: 0,
      });
    });

    it("should add page metadata at stage 1 without comments", () => {
      const gated = applyDepthGate(fullRecord, 1);
      expect(gated.title).toBe("T");
      expect(gated.summary).toBe("S");
      expect(gated.hasComments).toBe(false);
      expect(gated.comments).toEqual([]);
    });

    it("should keep comment text but not metadata at stage 2", () => {
      const gated = applyDepthGate(fullRecord, 2);
      expect(gated.hasComments).toBe(true);
      expect(gated.comments).toEqual([{ text: "c1" }]);
    });

    it("should keep comment metadata at stage 3", () => {
      expect(applyDepthGate(fullRecord, 3).comments).toEqual([
        { text: "c1", author: "u1", postedAt: "1h", likes: 3 },
      ]);
    });

    it("should never emit fields beyond the completed stage", () => {
      for (const stage of [0, 1, 2, 3] as const) {
        const allowed = new Set(stagesUpTo(stage).flatMap((s) => STAGE_FIELDS[s]));
        const gated = applyDepthGate(fullRecord, stage);

        for (const key of Object.keys(gated)) {
          expect(allowed.has(key)).toBe(true);
        }
        for (const comment of gated.comments) {
          const keys = Object.keys(comment);
          expect(stage >= 3 || keys.every((k) => k === "text")).toBe(true);
        }
      }
    });
  });
});
