import { z } from "zod";

export const Command = z.enum(["weapon", "scroll", "roll-table", "help"]);
export type Command = z.infer<typeof Command>;

export const OutputFormat = z.enum(["text", "yaml", "markdown"]);
export type OutputFormat = z.infer<typeof OutputFormat>;

export const ItemKind = z.enum(["weapon", "scroll"]);
export type ItemKind = z.infer<typeof ItemKind>;

export const CliArgs = z
  .object({
    command: Command.default("help"),
    /** Challenge rating; picks the rarity odds. */
    cr: z.coerce.number().int().min(0).optional(),
    seed: z.coerce.number().int().optional(),
    count: z.coerce.number().int().min(1).max(1000).default(1),
    kind: ItemKind.default("weapon"),
    die: z.coerce.number().int().min(1).max(1000).default(20),
    hideRolls: z.boolean().default(false),
    expanded: z.boolean().default(false),
    width: z.coerce.number().int().min(20).default(180),
    output: OutputFormat.default("text")
  })
  .strict();

export type CliArgs = z.infer<typeof CliArgs>;

export function getArgValue(args: string[], name: string): string | undefined {
  const idx = args.indexOf(name);
  if (idx === -1) return undefined;
  const v = args[idx + 1];
  if (!v || v.startsWith("--")) return undefined;
  return v;
}

export function hasFlag(args: string[], name: string): boolean {
  return args.includes(name);
}

/** `relicforge <command> [options]`; a leading option means no command was given. */
export function parseArgs(argv: string[]): CliArgs {
  const [first] = argv;
  const command = first !== undefined && !first.startsWith("--") ? first : undefined;
  const args = command === undefined ? argv : argv.slice(1);
  if (hasFlag(args, "--help")) return CliArgs.parse({ command: "help" });
  return CliArgs.parse({
    command,
    cr: getArgValue(args, "--cr"),
    seed: getArgValue(args, "--seed"),
    count: getArgValue(args, "--count"),
    kind: getArgValue(args, "--kind"),
    die: getArgValue(args, "--die"),
    hideRolls: hasFlag(args, "--hide-rolls"),
    expanded: hasFlag(args, "--expanded"),
    width: getArgValue(args, "--width"),
    output: getArgValue(args, "--output")
  });
}

export const USAGE = [
  "Usage: relicforge <command> [options]",
  "",
  "Commands:",
  "  weapon                Generate random weapons",
  "  scroll                Generate random spell scrolls",
  "  roll-table            Print a roll table of random items",
  "  help                  Show this help",
  "",
  "Options:",
  "  --cr <n>              Challenge rating used to pick rarity (default 0)",
  "  --seed <n>            Seed for a replayable run",
  "  --count <n>           Items to generate (default 1)",
  "  --kind <kind>         roll-table item kind: weapon | scroll (default weapon)",
  "  --die <n>             roll-table die size (default 20)",
  "  --hide-rolls          roll-table: leave out the Roll column",
  "  --expanded            roll-table: one row per die face",
  "  --width <n>           roll-table text width (default 180)",
  "  --output <format>     roll-table output: text | yaml | markdown (default text)"
].join("\n");
