import { mulberry32 } from "@relicforge/engine";
import { env, logLevel } from "./config";
import { createLogger } from "./logger";
import { parseArgs, USAGE } from "./lib/args";
import { generateItems } from "./lib/generate";
import { renderRollTable, rollRows } from "./lib/rollTable";

const logger = createLogger(logLevel(env));

async function main(): Promise<void> {
  const args = parseArgs(process.argv.slice(2));
  if (args.command === "help") {
    console.log(USAGE);
    return;
  }

  const seed = args.seed ?? env.RELICFORGE_SEED;
  const rng = seed === undefined ? Math.random : mulberry32(seed);
  const options = { dataDir: env.RELICFORGE_DATA_DIR, rng, difficulty: args.cr, logger };
  logger.debug({ ...args, seed, dataDir: env.RELICFORGE_DATA_DIR }, "Generating");

  if (args.command === "roll-table") {
    const items = await generateItems(args.kind, args.die, options);
    const rows = rollRows(items, !args.expanded);
    console.log(renderRollTable(rows, { output: args.output, hideRolls: args.hideRolls, width: args.width }));
    return;
  }

  const items = await generateItems(args.command, args.count, options);
  for (const item of items) console.log(item.details);
}

main().catch((err) => {
  logger.error({ err }, err instanceof Error ? err.message : String(err));
  process.exit(1);
});
