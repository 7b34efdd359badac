import { TemplateSyntaxError } from "./errors";

export type TemplatePart = { kind: "literal"; text: string } | { kind: "placeholder"; path: string[] };

const TOKEN = /\{\{|\}\}|\{([^{}]*)\}|[{}]/g;

export function parseTemplate(template: string): TemplatePart[] {
  const parts: TemplatePart[] = [];
  let literal = "";
  let last = 0;
  for (const match of template.matchAll(TOKEN)) {
    const at = match.index ?? 0;
    literal += template.slice(last, at);
    last = at + match[0].length;
    if (match[0] === "{{") {
      literal += "{";
      continue;
    }
    if (match[0] === "}}") {
      literal += "}";
      continue;
    }
    const body = match[1];
    if (body === undefined) {
      const brace = match[0];
      throw new TemplateSyntaxError(
        template,
        `unbalanced "${brace}" at ${at}; write "${brace}${brace}" for a literal brace`
      );
    }
    const path = body.trim().split(".");
    if (path.some((segment) => segment.length === 0)) {
      throw new TemplateSyntaxError(template, `empty placeholder path "{${body}}"`);
    }
    if (literal) parts.push({ kind: "literal", text: literal });
    literal = "";
    parts.push({ kind: "placeholder", path });
  }
  literal += template.slice(last);
  if (literal) parts.push({ kind: "literal", text: literal });
  return parts;
}

/** True when the string holds at least one `{placeholder}`, ignoring escaped braces. */
export function hasPlaceholder(template: string): boolean {
  return /\{[^{}]+\}/.test(template.replace(/\{\{|\}\}/g, ""));
}

/** Placeholder paths in order of appearance. */
export function placeholderPaths(template: string): string[][] {
  return parseTemplate(template).flatMap((part) => (part.kind === "placeholder" ? [part.path] : []));
}

export function renderTemplate(template: string, lookup: (path: string[]) => string): string {
  return parseTemplate(template)
    .map((part) => (part.kind === "literal" ? part.text : lookup(part.path)))
    .join("");
}

const MINOR_WORDS = new Set(["a", "an", "and", "of", "the"]);

/**
 * Upper-cases the first letter of every whitespace-separated word and
 * lower-cases the rest. Minor words stay lower-case unless they lead.
 */
export function titleCase(text: string): string {
  let first = true;
  return text.replace(/\S+/g, (word) => {
    const lower = word.toLowerCase();
    const leading = first;
    first = false;
    if (!leading && MINOR_WORDS.has(lower)) return lower;
    return lower.charAt(0).toUpperCase() + lower.slice(1);
  });
}
