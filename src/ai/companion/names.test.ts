import { describe, it, expect } from "vitest";
import { capitalizeName, cleanDisplayName, extractName } from "./names";
import { loadEngineTables } from "./tables";

const { namePatterns, nameStopWords } = loadEngineTables();
const nameOf = (message: string) => extractName(message, namePatterns, nameStopWords);

describe("extractName", () => {
  it("finds English introductions", () => {
    expect(nameOf("my name is ravi")).toBe("Ravi");
    expect(nameOf("MY NAME IS RAVI")).toBe("Ravi");
    expect(nameOf("Call me Lakshmi please")).toBe("Lakshmi");
    expect(nameOf("My name's Arjun")).toBe("Arjun");
    expect(nameOf("I am Selvi")).toBe("Selvi");
  });

  it("accepts curly apostrophes", () => {
    expect(nameOf("I’m Meena")).toBe("Meena");
  });

  it("returns null for stop words and one-letter captures", () => {
    expect(nameOf("I am fine")).toBeNull();
    expect(nameOf("I am very tired")).toBeNull();
    expect(nameOf("I'm a nurse")).toBeNull();
  });

  it("does not take ordinary words after I'm / I am for names", () => {
    for (const msg of [
      "I'm sure",
      "I am thinking about you",
      "I'm missing you",
      "I am waiting for my son",
      "I'm busy today",
      "I am ready",
      "I'm unhappy",
    ]) {
      expect(nameOf(msg)).toBeNull();
    }
  });

  it("finds Tamil introductions", () => {
    expect(nameOf("என் பெயர் ரவி")).toBe("ரவி");
    expect(nameOf("என்னுடைய பேர் லட்சுமி")).toBe("லட்சுமி");
    expect(nameOf("என் பெயர் Ravi")).toBe("Ravi");
    expect(nameOf("என்னை ரவி என்று அழை")).toBe("ரவி");
    expect(nameOf("என் பெயர் என்ன?")).toBeNull();
  });

  it("returns null without an introduction", () => {
    expect(nameOf("")).toBeNull();
    expect(nameOf("hello there")).toBeNull();
    expect(nameOf("names are hard")).toBeNull();
  });

  it("gives the same answer on repeated calls", () => {
    expect(nameOf("my name is ravi")).toBe("Ravi");
    expect(nameOf("my name is ravi")).toBe("Ravi");
  });
});

describe("capitalizeName / cleanDisplayName", () => {
  it("capitalizes the first letter only", () => {
    expect(capitalizeName("rAVI")).toBe("Ravi");
    expect(capitalizeName("  ")).toBe("");
  });

  it("treats blank display names as absent", () => {
    expect(cleanDisplayName("  Meena ")).toBe("Meena");
    expect(cleanDisplayName("   ")).toBeNull();
    expect(cleanDisplayName(undefined)).toBeNull();
  });
});
