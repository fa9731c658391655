import { existsSync } from "fs";
import { pathToFileURL } from "url";
import { creationSettingsCodec, createPreset, PRESET_NAMES, type PresetName } from "../src/lib/battles/presets.js";
import { ensureDataDirectories, resolvePaths } from "../src/lib/config.js";
import { readOrCreateDocument } from "../src/lib/storage/documents.js";
import { savePath, writeSave } from "../src/lib/storage/saves.js";
import { loadCatalog } from "../src/lib/wiki/load.js";

function isPresetName(value: string): value is PresetName {
  return (PRESET_NAMES as readonly string[]).includes(value);
}

async function main() {
  const [, , nameArg, presetArg = "blank", ...playerArgs] = process.argv;
  const name = nameArg?.trim();
  if (!name || !isPresetName(presetArg)) {
    console.error(`Usage: tsx scripts/new_save.ts <name> [${PRESET_NAMES.join("|")}] [player ...]`);
    process.exitCode = 1;
    return;
  }

  const paths = resolvePaths();
  ensureDataDirectories(paths);

  if (existsSync(savePath(paths.savesDir, name))) {
    throw new Error(`A save named ${name} already exists.`);
  }

  const settings = readOrCreateDocument(paths.creationSettingsPath, creationSettingsCodec);
  if (!settings) {
    throw new Error(`Unable to load ${paths.creationSettingsPath}`);
  }

  const { catalog } = loadCatalog(paths);
  const log = createPreset(
    presetArg,
    {
      fileName: name,
      playerNames: playerArgs.length > 0 ? playerArgs : settings.playerNames,
      bosses: settings.bosses,
    },
    catalog,
  );

  if (!writeSave(paths.savesDir, log)) {
    throw new Error(`Failed to write save ${name}`);
  }
  console.log(`Created ${presetArg} save ${name} with ${log.size} battles for ${log.playerCount} players`);
}

const isMain = process.argv[1] && pathToFileURL(process.argv[1]).href === import.meta.url;

if (isMain) {
  main().catch((error) => {
    console.error(error);
    process.exitCode = 1;
  });
}
