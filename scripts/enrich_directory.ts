import { Command } from "commander";
import { runAdresmatchFile } from "./adresmatch";
import { parseNonNegativeInt, runCli } from "./cli";
import { defaultAdresmatchOptions, defaultBuildingOutputPath, defaultGebouwOptions } from "./config";
import { discoverInputs } from "./csv_io";
import { runBuildingFile } from "./gebouwen";
import { withErrorHandling } from "./validation";

type EnrichDirectoryCliOptions = {
  skipBuildings?: boolean;
  force?: boolean;
  maxRows?: number;
  authToken?: string;
  auth?: string;
};

const program = new Command()
  .name("enrich-directory")
  .description("Run adresmatch and the gebouwenregister lookup over every CSV in a directory.")
  .argument("<dir>", "Directory holding the input CSV files")
  .option("--skip-buildings", "Only run adresmatch")
  .option("--force", "Re-query rows that already have a status")
  .option("--max-rows <n>", "Per file and pipeline, stop after this many processed rows", parseNonNegativeInt)
  .option("--auth-token <token>", "Bearer token for adresmatch")
  .option("--auth <header>", "Authorization header value for the gebouwenregister")
  .action(async (dir: string, opts: EnrichDirectoryCliOptions) => {
    const inputs = await discoverInputs(dir);
    if (inputs.length === 0) {
      console.log(`No CSV files found in ${dir}`);
      process.exit(1);
    }

    console.log(`🔨 Enriching ${inputs.length} files from ${dir}`);
    const force = Boolean(opts.force);
    let failures = 0;

    for (const csvPath of inputs) {
      console.log(`\n📦 ${csvPath}`);
      const adresmatch = await withErrorHandling(
        () => runAdresmatchFile(csvPath, defaultAdresmatchOptions({ force, maxRows: opts.maxRows, authToken: opts.authToken })),
        `Adresmatch for ${csvPath}`
      );
      if (!adresmatch.success) {
        failures++;
        continue;
      }
      if (opts.skipBuildings) continue;

      const buildings = await withErrorHandling(
        () =>
          runBuildingFile(
            csvPath,
            defaultGebouwOptions({ force, maxRows: opts.maxRows, auth: opts.auth }),
            defaultBuildingOutputPath(csvPath)
          ),
        `Gebouwenregister for ${csvPath}`
      );
      if (!buildings.success) failures++;
    }

    if (failures > 0) {
      console.error(`\n❌ ${failures} step(s) failed`);
      process.exit(1);
    }
    console.log("\n✅ Enrichment complete!");
  });

runCli(program, "enrich_directory");
