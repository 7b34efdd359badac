import { describe, it, expect } from "vitest";
import { applyOverrides, findRequirements, resolveAttributes } from "./attributes";
import { MissingAttributeError, TemplateSyntaxError } from "./errors";
import { Item } from "./item";

describe("resolveAttributes", () => {
  it("renders numbers into templates and lifts the name out", () => {
    const node = resolveAttributes({ name: "{length}ft. Pole", weight: "7lbs.", value: 5, length: 10 });
    expect(node.name).toBe("10ft. Pole");
    expect(node.has("name")).toBe(false);
    expect(node.get("length")).toEqual({ kind: "scalar", value: 10 });
    expect(node.text("weight")).toBe("7lbs.");
  });

  it("reads an item's name as rendered", () => {
    expect(Item.fromAttributes({ name: "{length}ft. Pole", weight: "7lbs.", value: 5, length: 10 }).name).toBe(
      "10ft. Pole"
    );
  });

  it("lets property templates read nested top-level attributes", () => {
    const pole = Item.fromAttributes({
      name: "{length}ft. Pole",
      length: 10,
      properties: {
        engraved: { description: '"Property of {info.owner}!"' }
      },
      info: { owner: "Jules Ultardottir" }
    });
    expect(pole.description).toBe('Engraved. "Property of Jules Ultardottir!"');
  });

  it("applies overrides before rendering anything that reads them", () => {
    const pole = Item.fromAttributes({
      name: "{length}ft. Pole",
      length: 10,
      properties: {
        broken: {
          description: "The end of this 10ft. pole has been snapped off.",
          override_length: 7
        }
      }
    });
    expect(pole.name).toBe("7ft. Pole");
    expect(pole.attributes.number("length")).toBe(7);
    expect(pole.description).toBe("Broken. The end of this 10ft. pole has been snapped off.");
  });

  it("shows overridden values to every template", () => {
    const node = resolveAttributes({
      name: "pole",
      length: 10,
      label: "{length} feet",
      properties: { broken: { override_length: 7, note: "now {length} feet" } }
    });
    expect(node.text("label")).toBe("7 feet");
    expect(node.text("properties.broken.note")).toBe("now 7 feet");
  });

  it("ignores falsy overrides", () => {
    const node = resolveAttributes({ length: 10, properties: { odd: { override_length: 0 } } });
    expect(node.number("length")).toBe(10);
  });

  it("lets the last property win when two override the same attribute", () => {
    const node = resolveAttributes({
      length: 10,
      properties: { broken: { override_length: 7 }, shattered: { override_length: 3 } }
    });
    expect(node.number("length")).toBe(3);
  });

  it("resolves `this` to the property being rendered", () => {
    const node = resolveAttributes({
      name: "club",
      properties: { flaming: { damage: "1d6", description: "Deals {this.damage} extra." } }
    });
    expect(node.text("properties.flaming.description")).toBe("Deals 1d6 extra.");
  });

  it("keeps property contents out of reach of top-level templates", () => {
    expect(() =>
      resolveAttributes({ name: "club", label: "{flaming.damage}", properties: { flaming: { damage: "1d6" } } })
    ).toThrow(MissingAttributeError);
  });

  it("does not expose the top-level name to templates", () => {
    expect(() => resolveAttributes({ name: "club", label: "a {name}" })).toThrow(MissingAttributeError);
  });

  it("renders plain attributes before templated ones", () => {
    const node = resolveAttributes({ a: "{b} and more", b: 5 });
    expect(node.text("a")).toBe("5 and more");
    expect(node.keys()).toEqual(["a", "b"]);
  });

  it("only orders templated attributes by their position", () => {
    expect(resolveAttributes({ b: "{c}?", a: "{b}!", c: 1 }).text("a")).toBe("1?!");
    expect(() => resolveAttributes({ a: "{b}!", b: "{c}?", c: 1 })).toThrow(MissingAttributeError);
  });

  it("resolves siblings inside nested mappings", () => {
    const node = resolveAttributes({ info: { first: "Jules", full: "{first} Ultardottir" } });
    expect(node.text("info.full")).toBe("Jules Ultardottir");
    expect(node.node("info")?.keys()).toEqual(["first", "full"]);
  });

  it("resolves each sequence element on its own", () => {
    const node = resolveAttributes({ length: 10, tags: ["{length}ft", 3, { label: "{length}" }], first: "{tags.0}" });
    const tags = node.get("tags");
    expect(tags?.kind).toBe("sequence");
    expect(tags?.kind === "sequence" && tags.items.slice(0, 2)).toEqual([
      { kind: "text", value: "10ft" },
      { kind: "scalar", value: 3 }
    ]);
    expect(node.text("tags.2.label")).toBe("10");
    expect(node.text("first")).toBe("10ft");
  });

  it("freezes rendered sequences", () => {
    const tags = resolveAttributes({ tags: ["a", "b"] }).get("tags");
    expect(tags?.kind === "sequence" && Object.isFrozen(tags.items)).toBe(true);
  });

  it("rejects prose with a lone brace, naming the escape", () => {
    expect(() => resolveAttributes({ description: "Curly } prose" })).toThrow(TemplateSyntaxError);
    expect(() => resolveAttributes({ description: "Curly } prose" })).toThrow(
      'Invalid template "Curly } prose": unbalanced "}" at 6; write "}}" for a literal brace'
    );
    expect(resolveAttributes({ description: "Curly }} prose" }).text("description")).toBe("Curly } prose");
  });

  it("renders a nested node by its name", () => {
    const node = resolveAttributes({ spell: { name: "Fireball", level: "3rd" }, title: "Scroll of {spell}" });
    expect(node.text("title")).toBe("Scroll of Fireball");
    expect(node.node("spell")?.name).toBe("Fireball");
    expect(node.text("spell.name")).toBe("Fireball");
  });

  it("unescapes doubled braces", () => {
    expect(resolveAttributes({ note: "{{literal}}", n: 2, m: "{{{n}}}" }).toPlain()).toEqual({
      note: "{literal}",
      n: 2,
      m: "{2}"
    });
  });

  it("reports the path it could not resolve", () => {
    try {
      resolveAttributes({ description: "Owned by {info.owner}", info: { name: "ledger" } });
      expect.unreachable();
    } catch (err) {
      expect(err).toBeInstanceOf(MissingAttributeError);
      expect(err instanceof MissingAttributeError && err.path).toBe("info.owner");
    }
  });

  it("serializes back to plain data with properties last", () => {
    const node = resolveAttributes({
      name: "{length}ft. Pole",
      properties: { engraved: { description: "by {maker}" } },
      length: 10,
      maker: "Jules"
    });
    expect(node.toPlain()).toEqual({
      length: 10,
      maker: "Jules",
      properties: { engraved: { description: "by Jules" } }
    });
    expect(node.keys()).toEqual(["length", "maker", "properties"]);
  });
});

describe("applyOverrides", () => {
  it("copies truthy override values without touching the input", () => {
    const attrs = { length: 10, color: "oak" };
    const next = applyOverrides(attrs, { broken: { override_length: 7, override_color: "" } });
    expect(next).toEqual({ length: 7, color: "oak" });
    expect(attrs.length).toBe(10);
  });
});

describe("findRequirements", () => {
  it("lists attributes referenced but defined at no enclosing level", () => {
    expect(
      findRequirements({
        name: "{enchantment.nouns} blade",
        element: "fire",
        properties: {
          searing: { damage: 1, description: "{this.damage} {element} {damage} {spell.name}" }
        }
      })
    ).toEqual(["enchantment", "spell"]);
  });

  it("treats override targets as defined", () => {
    expect(findRequirements({ label: "{length}", properties: { broken: { override_length: 7 } } })).toEqual([]);
  });

  it("returns nothing for untemplated mappings", () => {
    expect(findRequirements({ name: "club", length: 3, tags: ["a", "b"] })).toEqual([]);
  });
});
