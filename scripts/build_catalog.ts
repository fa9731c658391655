import { pathToFileURL } from "url";
import { ensureDataDirectories, resolvePaths } from "../src/lib/config.js";
import { writeTextFile } from "../src/lib/storage/documents.js";
import { loadCatalog } from "../src/lib/wiki/load.js";

async function main() {
  const paths = resolvePaths();
  ensureDataDirectories(paths);

  const { catalog, warnings } = loadCatalog(paths);
  if (!writeTextFile(paths.catalogPath, JSON.stringify(catalog.toJSON(), null, 2))) {
    throw new Error(`Unable to write ${paths.catalogPath}`);
  }
  console.log(`Wrote ${catalog.size} entities to ${paths.catalogPath} (${warnings.length} scan warnings)`);
}

const isMain = process.argv[1] && pathToFileURL(process.argv[1]).href === import.meta.url;

if (isMain) {
  main().catch((error) => {
    console.error(error);
    process.exitCode = 1;
  });
}
