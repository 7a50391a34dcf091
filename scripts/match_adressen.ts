import { Command } from "commander";
import { runAdresmatchFile } from "./adresmatch";
import { parseNonNegativeInt, parseNonNegativeNumber, runCli, secondsToMs } from "./cli";
import { DEFAULT_ADRESMATCH_RATE_LIMIT, DEFAULT_ADRESMATCH_URL, DEFAULT_TIMEOUT_S, defaultAdresmatchOptions } from "./config";
import { withErrorHandling } from "./validation";

type MatchAdressenCliOptions = {
  apiUrl: string;
  authToken?: string;
  timeout: number;
  delay: number;
  rateLimit: number;
  output?: string;
  force?: boolean;
  maxRows?: number;
  report?: string;
};

const program = new Command()
  .name("match-adressen")
  .description("Augment a Belgian address CSV with Adressenregister adresmatch results.")
  .argument("<csv_path>", "Input CSV, updated in place unless --output is set")
  .option("--api-url <url>", "Adresmatch endpoint to call", DEFAULT_ADRESMATCH_URL)
  .option("--auth-token <token>", "Bearer token for the Authorization header")
  .option("--timeout <seconds>", "HTTP timeout per request", parseNonNegativeNumber, DEFAULT_TIMEOUT_S)
  .option("--delay <seconds>", "Extra sleep after each processed row", parseNonNegativeNumber, 0)
  .option("--rate-limit <n>", "Maximum requests per second (0 disables)", parseNonNegativeNumber, DEFAULT_ADRESMATCH_RATE_LIMIT)
  .option("--output <path>", "Write the enriched CSV here instead of overwriting the input")
  .option("--force", "Re-query rows that already have an adresmatch_status")
  .option("--max-rows <n>", "Stop after this many rows were processed", parseNonNegativeInt)
  .option("--report <path>", "Write a JSON status report")
  .action(async (csvPath: string, opts: MatchAdressenCliOptions) => {
    const options = defaultAdresmatchOptions({
      apiUrl: opts.apiUrl,
      authToken: opts.authToken,
      timeoutMs: secondsToMs(opts.timeout),
      delayMs: secondsToMs(opts.delay),
      rateLimit: opts.rateLimit,
      force: Boolean(opts.force),
      maxRows: opts.maxRows,
    });

    const result = await withErrorHandling(
      () => runAdresmatchFile(csvPath, options, opts.output ?? csvPath, opts.report),
      "Adresmatch"
    );
    if (!result.success) process.exit(1);
  });

runCli(program, "match_adressen");
