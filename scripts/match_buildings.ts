import { Command } from "commander";
import { parseNonNegativeInt, parseNonNegativeNumber, runCli, secondsToMs } from "./cli";
import {
  DEFAULT_ADRES_ID_FIELD,
  DEFAULT_BUILDING_LIMIT,
  DEFAULT_GEBOUW_RATE_LIMIT,
  DEFAULT_GEBOUWEENHEDEN_URL,
  DEFAULT_GEBOUWEN_URL,
  DEFAULT_RETRIES,
  DEFAULT_RETRY_WAIT_S,
  DEFAULT_TIMEOUT_S,
  defaultBuildingOutputPath,
  defaultGebouwOptions,
} from "./config";
import { runBuildingFile } from "./gebouwen";
import { withErrorHandling } from "./validation";

type MatchBuildingsCliOptions = {
  output?: string;
  gebouwenUrl: string;
  gebouweenhedenUrl: string;
  adresIdField: string;
  buildingLimit: number;
  includeHistoric?: boolean;
  timeout: number;
  retries: number;
  retryWait: number;
  rateLimit: number;
  delay: number;
  maxRows?: number;
  force?: boolean;
  auth?: string;
  report?: string;
};

const program = new Command()
  .name("match-buildings")
  .description("Enrich adresmatch CSV rows with gebouwenregister footprints.")
  .argument("<csv_path>", "Input CSV enriched with adresmatch results")
  .option("--output <path>", "Output CSV (default: <input>_gebouwen.csv)")
  .option("--gebouwen-url <url>", "Base URL of the gebouwen endpoint", DEFAULT_GEBOUWEN_URL)
  .option("--gebouweenheden-url <url>", "Base URL of the gebouweenheden endpoint", DEFAULT_GEBOUWEENHEDEN_URL)
  .option("--adres-id-field <column>", "Column holding the adres id from adresmatch", DEFAULT_ADRES_ID_FIELD)
  .option("--building-limit <n>", "Maximum gebouweenheden requested per adres", parseNonNegativeInt, DEFAULT_BUILDING_LIMIT)
  .option("--include-historic", "Take the first gebouweenheid even when it is historic")
  .option("--timeout <seconds>", "HTTP timeout per API call", parseNonNegativeNumber, DEFAULT_TIMEOUT_S)
  .option("--retries <n>", "Retries for failed API calls", parseNonNegativeInt, DEFAULT_RETRIES)
  .option("--retry-wait <seconds>", "Wait between retries", parseNonNegativeNumber, DEFAULT_RETRY_WAIT_S)
  .option("--rate-limit <n>", "Maximum requests per second (0 disables)", parseNonNegativeNumber, DEFAULT_GEBOUW_RATE_LIMIT)
  .option("--delay <seconds>", "Extra sleep after each processed row", parseNonNegativeNumber, 0)
  .option("--max-rows <n>", "Stop after this many rows were processed", parseNonNegativeInt)
  .option("--force", "Re-query rows that already have a gebouwregister_status")
  .option("--auth <header>", "Authorization header value, e.g. 'Bearer <token>'")
  .option("--report <path>", "Write a JSON status report")
  .action(async (csvPath: string, opts: MatchBuildingsCliOptions) => {
    const options = defaultGebouwOptions({
      gebouwenUrl: opts.gebouwenUrl,
      gebouweenhedenUrl: opts.gebouweenhedenUrl,
      adresIdField: opts.adresIdField,
      buildingLimit: opts.buildingLimit,
      includeHistoric: Boolean(opts.includeHistoric),
      timeoutMs: secondsToMs(opts.timeout),
      retries: opts.retries,
      retryWaitMs: secondsToMs(opts.retryWait),
      rateLimit: opts.rateLimit,
      delayMs: secondsToMs(opts.delay),
      maxRows: opts.maxRows,
      force: Boolean(opts.force),
      auth: opts.auth,
    });
    const outputPath = opts.output ?? defaultBuildingOutputPath(csvPath);

    const result = await withErrorHandling(
      () => runBuildingFile(csvPath, options, outputPath, opts.report),
      "Gebouwenregister"
    );
    if (!result.success) process.exit(1);
  });

runCli(program, "match_buildings");
