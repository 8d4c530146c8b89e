import { describe, it, expect } from "vitest";
import { containsTamil, detectLanguage, isLanguage } from "./detectLanguage";
import { includesAtWordStart, normalizeForMatching, normalizeQuotes } from "./normalize";

describe("detectLanguage", () => {
  it("detects Tamil from a single code point", () => {
    expect(containsTamil("ok ஆ")).toBe(true);
    expect(containsTamil("plain ascii")).toBe(false);
    expect(detectLanguage("வணக்கம்")).toBe("tamil");
    expect(detectLanguage("Hello")).toBe("english");
  });

  it("lets a forced language win", () => {
    expect(detectLanguage("Hello", "tamil")).toBe("tamil");
    expect(detectLanguage("வணக்கம்", "english")).toBe("english");
    expect(detectLanguage("வணக்கம்", null)).toBe("tamil");
  });

  it("recognises supported languages", () => {
    expect(isLanguage("tamil")).toBe(true);
    expect(isLanguage("auto")).toBe(false);
    expect(isLanguage(undefined)).toBe(false);
  });
});

describe("normalize", () => {
  it("straightens quotes and dashes", () => {
    expect(normalizeQuotes("I’m “here” – now")).toBe(`I'm "here" - now`);
  });

  it("lowercases and collapses whitespace", () => {
    expect(normalizeForMatching("  How   ARE\tyou ")).toBe("how are you");
    expect(normalizeForMatching("")).toBe("");
  });

  it("finds keywords only where a word starts", () => {
    expect(includesAtWordStart("i am unhappy", "happy")).toBe(false);
    expect(includesAtWordStart("unhappy but happy", "happy")).toBe(true);
    expect(includesAtWordStart("so lonely, really", "lonely")).toBe(true);
    expect(includesAtWordStart("மிகவும் தனிமையாக", "தனிமை")).toBe(true);
    expect(includesAtWordStart("anything", "")).toBe(false);
  });
});
