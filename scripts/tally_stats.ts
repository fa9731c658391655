import { pathToFileURL } from "url";
import { ensureDataDirectories, resolvePaths, STATS_PER_PAGE } from "../src/lib/config.js";
import { loadSave } from "../src/lib/storage/saves.js";
import { bestPlayers, createDisplayedStats, formatResultMessage, pageCount, statPage } from "../src/lib/stats/displayed.js";
import { tallyStat } from "../src/lib/stats/engine.js";
import { loadCatalog } from "../src/lib/wiki/load.js";

async function main() {
  const [, , nameArg, pageArg = "1"] = process.argv;
  const page = Number(pageArg);
  if (!nameArg || !Number.isInteger(page) || page < 1) {
    console.error("Usage: tsx scripts/tally_stats.ts <save name> [page]");
    process.exitCode = 1;
    return;
  }

  const paths = resolvePaths();
  ensureDataDirectories(paths);

  const log = loadSave(paths.savesDir, nameArg);
  if (!log) {
    throw new Error(`Unable to load save ${nameArg}`);
  }
  const { catalog } = loadCatalog(paths);

  const stats = createDisplayedStats();
  console.log(`${log.fileName}: ${log.size} battles, page ${page} of ${pageCount(stats.length)}`);
  if (log.lastAddedKey) {
    console.log(`Last added: ${catalog.displayNameFor(log.lastAddedKey)}`);
  }

  for (const stat of statPage(stats, page - 1, STATS_PER_PAGE)) {
    if (stat.isDivider) {
      console.log(`\n== ${stat.title} ==`);
      continue;
    }
    const tally = tallyStat(stat, log, catalog);
    const best = new Set(bestPlayers(tally, log.playerCount));
    const marker = best.size > 0 ? `  best: ${[...best].map((index) => log.playerName(index)).join(", ")}` : "";
    console.log(`\n${tally.title}${marker}`);
    console.log(formatResultMessage(tally, log));
  }
}

const isMain = process.argv[1] && pathToFileURL(process.argv[1]).href === import.meta.url;

if (isMain) {
  main().catch((error) => {
    console.error(error);
    process.exitCode = 1;
  });
}
