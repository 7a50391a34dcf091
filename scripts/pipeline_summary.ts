import { Command } from "commander";
import { runCli } from "./cli";
import { loadRows } from "./csv_io";
import { ADRESMATCH_STATUS_COLUMNS, GEBOUW_STATUS_COLUMNS } from "./types";
import { formatCounts, summarizeStatuses, withErrorHandling, writeStatusReport } from "./validation";

type PipelineSummaryCliOptions = {
  out?: string;
};

const program = new Command()
  .name("pipeline-summary")
  .description("Count adresmatch and gebouwenregister statuses in an enriched CSV.")
  .argument("<csv_path>", "Enriched CSV to summarize")
  .option("--out <path>", "Also write the summary as JSON")
  .action(async (csvPath: string, opts: PipelineSummaryCliOptions) => {
    const result = await withErrorHandling(async () => {
      const { rows, header } = await loadRows(csvPath);

      const summaries = [ADRESMATCH_STATUS_COLUMNS.status, GEBOUW_STATUS_COLUMNS.status]
        .filter((column) => header.includes(column))
        .map((column) => summarizeStatuses(rows, column));

      if (summaries.length === 0) {
        console.warn(`⚠️  ${csvPath} has no status columns yet`);
      }
      for (const s of summaries) {
        console.log(`📊 ${s.column}: ${s.with_status}/${s.total_rows} rows (${formatCounts(s.counts)})`);
      }

      if (opts.out) {
        await writeStatusReport(opts.out, "Pipeline summary", summaries, { input: csvPath });
      }
      return summaries;
    }, "Pipeline summary");

    if (!result.success) process.exit(1);
  });

runCli(program, "pipeline_summary");
