import { isRawMapping } from "@relicforge/shared";
import type { RawMapping, RawValue } from "@relicforge/shared";
import { MissingAttributeError } from "./errors";
import { hasPlaceholder, placeholderPaths, renderTemplate } from "./template";

/** Top-level key naming a node; it is lifted out of generic lookup. */
export const NAME_KEY = "name";
/** Key whose nested mappings are rendered after every other top-level attribute. */
export const PROPERTIES_KEY = "properties";
/** Placeholder segment naming the level currently being rendered. */
export const SELF_KEY = "this";
export const OVERRIDE_PREFIX = "override_";

/** A rendered attribute value. */
export type AttrValue =
  | { readonly kind: "scalar"; readonly value: number | boolean | null }
  | { readonly kind: "text"; readonly value: string }
  | { readonly kind: "node"; readonly value: AttributeNode }
  | { readonly kind: "sequence"; readonly items: readonly AttrValue[] };

/**
 * Immutable view over a rendered mapping. Every template has already been
 * rendered by the time a node exists; reads never render again.
 */
export class AttributeNode {
  readonly name: string | undefined;
  private readonly attrs: ReadonlyMap<string, AttrValue>;

  constructor(attrs: Map<string, AttrValue>, name?: string) {
    this.attrs = new Map(attrs);
    if (name !== undefined) {
      this.name = name;
    } else {
      const own = attrs.get(NAME_KEY);
      this.name = own?.kind === "text" ? own.value : undefined;
    }
  }

  has(key: string): boolean {
    return this.attrs.has(key);
  }

  keys(): string[] {
    return [...this.attrs.keys()];
  }

  entries(): Array<[string, AttrValue]> {
    return [...this.attrs.entries()];
  }

  get size(): number {
    return this.attrs.size;
  }

  get(path: string | string[]): AttrValue | undefined {
    const segments = typeof path === "string" ? path.split(".") : path;
    const [head, ...rest] = segments;
    const first = this.attrs.get(head);
    return first === undefined ? undefined : walk(first, rest);
  }

  /** Text for strings and scalars; undefined for nodes, sequences and missing paths. */
  text(path: string | string[]): string | undefined {
    const value = this.get(path);
    if (!value) return undefined;
    if (value.kind === "text") return value.value;
    if (value.kind === "scalar") return scalarText(value.value);
    return undefined;
  }

  number(path: string | string[]): number | undefined {
    const value = this.get(path);
    if (value?.kind === "scalar" && typeof value.value === "number") return value.value;
    if (value?.kind === "text" && value.value.trim() !== "") {
      const n = Number(value.value);
      return Number.isFinite(n) ? n : undefined;
    }
    return undefined;
  }

  node(path: string | string[]): AttributeNode | undefined {
    const value = this.get(path);
    return value?.kind === "node" ? value.value : undefined;
  }

  /** Plain rendered data, suitable for serialization. */
  toPlain(): RawMapping {
    const out: RawMapping = {};
    for (const [key, value] of this.attrs) out[key] = plain(value);
    return out;
  }
}

function walk(value: AttrValue, segments: string[]): AttrValue | undefined {
  let current: AttrValue | undefined = value;
  for (const segment of segments) {
    if (!current) return undefined;
    if (current.kind === "node") {
      current = current.value.get([segment]);
    } else if (current.kind === "sequence" && /^\d+$/.test(segment)) {
      current = current.items[Number(segment)];
    } else {
      return undefined;
    }
  }
  return current;
}

function plain(value: AttrValue): RawValue {
  switch (value.kind) {
    case "scalar":
    case "text":
      return value.value;
    case "node":
      return value.value.toPlain();
    case "sequence":
      return value.items.map(plain);
  }
}

function scalarText(value: number | boolean | null): string {
  return value === null ? "" : String(value);
}

export function attrText(value: AttrValue, path: string[], template: string): string {
  switch (value.kind) {
    case "text":
      return value.value;
    case "scalar":
      return scalarText(value.value);
    case "sequence":
      return value.items.map((item) => attrText(item, path, template)).join(", ");
    case "node": {
      if (value.value.name === undefined) throw new MissingAttributeError([...path, NAME_KEY].join("."), template);
      return value.value.name;
    }
  }
}

/** One level of rendered attributes, chained to the levels enclosing it. */
type Scope = {
  values: Map<string, AttrValue>;
  parent: Scope | null;
};

function lookup(scope: Scope, path: string[], template: string): string {
  const [head, ...rest] = path;
  let start: AttrValue | undefined;
  if (head === SELF_KEY) {
    start = { kind: "node", value: new AttributeNode(scope.values) };
  } else {
    for (let s: Scope | null = scope; s; s = s.parent) {
      start = s.values.get(head);
      if (start) break;
    }
  }
  const found = start === undefined ? undefined : walk(start, rest);
  if (!found) throw new MissingAttributeError(path.join("."), template);
  return attrText(found, path, template);
}

/** Whether a raw value holds a placeholder anywhere, nested values included. */
export function isTemplated(value: RawValue): boolean {
  if (typeof value === "string") return hasPlaceholder(value);
  if (Array.isArray(value)) return value.some(isTemplated);
  if (isRawMapping(value)) return Object.values(value).some(isTemplated);
  return false;
}

/**
 * Plain values first, templated values after, each group in insertion order.
 * A templated value that reads another templated value is only safe when the
 * other one comes earlier in the mapping.
 */
function renderOrder(raw: RawMapping): string[] {
  const keys = Object.keys(raw);
  return [...keys.filter((k) => !isTemplated(raw[k])), ...keys.filter((k) => isTemplated(raw[k]))];
}

function renderValue(value: RawValue, scope: Scope): AttrValue {
  if (typeof value === "string") {
    const template = value;
    if (!hasPlaceholder(template)) return { kind: "text", value: renderTemplate(template, () => "") };
    return { kind: "text", value: renderTemplate(template, (path) => lookup(scope, path, template)) };
  }
  if (Array.isArray(value)) {
    return { kind: "sequence", items: Object.freeze(value.map((item) => renderValue(item, scope))) };
  }
  if (isRawMapping(value)) return { kind: "node", value: new AttributeNode(renderLevel(value, scope)) };
  return { kind: "scalar", value };
}

function renderLevel(raw: RawMapping, parent: Scope | null): Map<string, AttrValue> {
  const scope: Scope = { values: new Map(), parent };
  for (const key of renderOrder(raw)) scope.values.set(key, renderValue(raw[key], scope));
  return reorder(scope.values, Object.keys(raw));
}

function reorder(values: Map<string, AttrValue>, keys: string[]): Map<string, AttrValue> {
  const ordered = new Map<string, AttrValue>();
  for (const key of keys) {
    const value = values.get(key);
    if (value) ordered.set(key, value);
  }
  return ordered;
}

function isTruthy(value: RawValue): boolean {
  if (Array.isArray(value)) return value.length > 0;
  if (isRawMapping(value)) return Object.keys(value).length > 0;
  return Boolean(value);
}

/**
 * Copies `override_<attr>` values found on any property over the matching
 * top-level attribute. Later properties win when two override the same one.
 */
export function applyOverrides(attrs: RawMapping, properties: RawMapping): RawMapping {
  const next: RawMapping = { ...attrs };
  for (const prop of Object.values(properties)) {
    if (!isRawMapping(prop)) continue;
    for (const [key, value] of Object.entries(prop)) {
      if (!key.startsWith(OVERRIDE_PREFIX) || !isTruthy(value)) continue;
      const target = key.slice(OVERRIDE_PREFIX.length);
      if (target) next[target] = value;
    }
  }
  return next;
}

/**
 * Builds the attribute graph for a raw mapping.
 *
 * `properties` is held back: its overrides are applied to the remaining
 * attributes first, then those attributes are rendered, and only then are the
 * properties rendered, with every top-level attribute in scope. The top-level
 * `name` is rendered last and kept off the node's attributes.
 */
export function resolveAttributes(raw: RawMapping): AttributeNode {
  const { [PROPERTIES_KEY]: properties, ...rest } = raw;
  const deferred = isRawMapping(properties) ? properties : undefined;
  const attrs = deferred ? applyOverrides(rest, deferred) : { ...rest };
  if (properties !== undefined && !deferred) attrs[PROPERTIES_KEY] = properties;

  const { [NAME_KEY]: rawName, ...named } = attrs;
  const values = renderLevel(named, null);
  const top: Scope = { values, parent: null };

  let name: string | undefined;
  if (rawName !== undefined) {
    const rendered = renderValue(rawName, top);
    name = attrText(rendered, [NAME_KEY], typeof rawName === "string" ? rawName : NAME_KEY);
  }

  if (deferred) values.set(PROPERTIES_KEY, renderValue(deferred, top));
  return new AttributeNode(values, name ?? "");
}

/**
 * First segments of placeholder paths that no enclosing level defines: the
 * attributes a generator must supply before the mapping can be resolved.
 * Override targets count as defined.
 */
export function findRequirements(raw: RawMapping): string[] {
  const found = new Set<string>();

  const scan = (value: RawValue, levels: Array<Set<string>>) => {
    if (typeof value === "string") {
      if (!hasPlaceholder(value)) return;
      for (const [head] of placeholderPaths(value)) {
        if (head === SELF_KEY) continue;
        if (!levels.some((keys) => keys.has(head))) found.add(head);
      }
    } else if (Array.isArray(value)) {
      for (const item of value) scan(item, levels);
    } else if (isRawMapping(value)) {
      const inner = [new Set(Object.keys(value)), ...levels];
      for (const item of Object.values(value)) scan(item, inner);
    }
  };

  const properties = raw[PROPERTIES_KEY];
  scan(isRawMapping(properties) ? applyOverrides(raw, properties) : raw, []);
  return [...found];
}
