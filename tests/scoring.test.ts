import { describe, it, expect } from "vitest";
import {
  OVERALL_MAX,
  contentTierScore,
  overallScore,
  scoreContent,
  scoreContextFile,
  scoreRobots,
  scoreStructuredData,
} from "../server/audit/scoring";

describe("scoring table", () => {
  it("adds up to 100", () => {
    expect(OVERALL_MAX).toBe(100);
  });

  it("scores robots proportionally to allowed agents", () => {
    const agents = [
      { agent: "A", allowed: true, reason: "Allowed" },
      { agent: "B", allowed: true, reason: "Allowed" },
      { agent: "C", allowed: false, reason: "Blocked by robots.txt" },
    ];
    expect(scoreRobots(true, agents)).toBe(16.7);
    expect(scoreRobots(false, agents)).toBe(0);
    expect(scoreRobots(true, [])).toBe(0);
  });

  it("gives the context file all or nothing", () => {
    expect(scoreContextFile(true, false)).toBe(10);
    expect(scoreContextFile(false, true)).toBe(10);
    expect(scoreContextFile(false, false)).toBe(0);
  });

  it("scores unique structured data types and caps at 25", () => {
    expect(scoreStructuredData([])).toBe(0);
    expect(scoreStructuredData(["Organization"])).toBe(11);
    expect(scoreStructuredData(["FAQPage", "FAQPage"])).toBe(13);
    expect(scoreStructuredData(["FAQPage", "HowTo", "Article", "Product"])).toBe(25);
  });

  it("picks the first word tier reached", () => {
    expect(contentTierScore(1500)).toBe(25);
    expect(contentTierScore(1499)).toBe(20);
    expect(contentTierScore(800)).toBe(20);
    expect(contentTierScore(400)).toBe(15);
    expect(contentTierScore(150)).toBe(8);
    expect(contentTierScore(149)).toBe(0);
  });

  it("adds structure bonuses and caps content at 40", () => {
    expect(scoreContent({ wordCount: 900, hasHeadings: true, hasLists: true, hasCodeBlocks: false })).toBe(32);
    expect(scoreContent({ wordCount: 2000, hasHeadings: true, hasLists: true, hasCodeBlocks: true })).toBe(40);
    expect(scoreContent({ wordCount: 10, hasHeadings: false, hasLists: false, hasCodeBlocks: true })).toBe(3);
  });

  it("rounds the overall sum to one decimal", () => {
    expect(overallScore(19.2, 0, 13, 32)).toBe(64.2);
  });
});
