import { pathToFileURL } from "url";
import { convertLegacyDirectory } from "../src/lib/battles/legacy.js";
import { ensureDataDirectories, resolvePaths } from "../src/lib/config.js";

async function main() {
  const paths = resolvePaths();
  ensureDataDirectories(paths);

  const { converted, skipped } = convertLegacyDirectory(paths.legacyDir, paths.savesDir);
  for (const name of converted) {
    console.log(`Converted ${name}`);
  }
  console.log(`Converted ${converted.length} legacy saves, skipped ${skipped.length}`);
}

const isMain = process.argv[1] && pathToFileURL(process.argv[1]).href === import.meta.url;

if (isMain) {
  main().catch((error) => {
    console.error(error);
    process.exitCode = 1;
  });
}
