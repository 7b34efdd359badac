import { describe, it, expect } from "vitest";
import { TemplateSyntaxError } from "./errors";
import { hasPlaceholder, parseTemplate, placeholderPaths, renderTemplate, titleCase } from "./template";

describe("parseTemplate", () => {
  it("splits literals from dotted placeholder paths", () => {
    expect(parseTemplate("Property of {info.owner}!")).toEqual([
      { kind: "literal", text: "Property of " },
      { kind: "placeholder", path: ["info", "owner"] },
      { kind: "literal", text: "!" }
    ]);
  });

  it("treats doubled braces as literal braces", () => {
    expect(parseTemplate("{{a}} {b}")).toEqual([
      { kind: "literal", text: "{a} " },
      { kind: "placeholder", path: ["b"] }
    ]);
  });

  it("rejects stray braces and empty paths", () => {
    expect(() => parseTemplate("oops {")).toThrow(TemplateSyntaxError);
    expect(() => parseTemplate("oops }")).toThrow(TemplateSyntaxError);
    expect(() => parseTemplate("oops }")).toThrow(
      'Invalid template "oops }": unbalanced "}" at 5; write "}}" for a literal brace'
    );
    expect(() => parseTemplate("{}")).toThrow(TemplateSyntaxError);
    expect(() => parseTemplate("{a..b}")).toThrow(TemplateSyntaxError);
  });
});

describe("placeholders", () => {
  it("detects placeholders but not escaped braces", () => {
    expect(hasPlaceholder("{length}ft. Pole")).toBe(true);
    expect(hasPlaceholder("{{length}}")).toBe(false);
    expect(hasPlaceholder("plain")).toBe(false);
  });

  it("lists paths in order", () => {
    expect(placeholderPaths("{a} {b.c} {this.d}")).toEqual([["a"], ["b", "c"], ["this", "d"]]);
  });

  it("renders through a lookup", () => {
    expect(renderTemplate("{n}ft. {kind}", ([key]) => (key === "n" ? "10" : "Pole"))).toBe("10ft. Pole");
  });
});

describe("titleCase", () => {
  it("capitalizes words and keeps minor words low", () => {
    expect(titleCase("thundering dagger of thunder")).toBe("Thundering Dagger of Thunder");
    expect(titleCase("staff OF strikes AND cold")).toBe("Staff of Strikes and Cold");
    expect(titleCase("the +3 mace")).toBe("The +3 Mace");
  });
});
