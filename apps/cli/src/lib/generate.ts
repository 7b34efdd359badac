import { ScrollGenerator, WeaponGenerator } from "@relicforge/engine";
import type { ItemView, Rng } from "@relicforge/engine";
import type { Logger } from "pino";
import type { ItemKind } from "./args";
import { loadScrollSources, loadWeaponSources } from "./tables";

export type GenerateOptions = {
  dataDir: string;
  rng: Rng;
  /** Challenge rating. */
  difficulty?: number;
  logger?: Logger;
};

export async function generateItems(kind: ItemKind, count: number, options: GenerateOptions): Promise<ItemView[]> {
  const { dataDir, rng, difficulty, logger } = options;
  if (kind === "scroll") {
    const generator = new ScrollGenerator(await loadScrollSources(dataDir, logger), { rng });
    return generator.random(count, { difficulty });
  }
  const generator = new WeaponGenerator(await loadWeaponSources(dataDir, logger), { rng });
  return generator.random(count, { difficulty });
}
