// scripts/run-job.ts
// ------------------------------------------------------------------------------------
// Runs one batch job locally:
//   npm run job -- extract   # link_input/*.csv  -> text_output/*.csv
//   npm run job -- parse     # text_output/*.csv -> final_output/*.csv
//   npm run job              # both, in one go
//   npm run job -- self-content   # self_content_input/*.csv -> final_output/self_final_output_*.csv
//
// Settings come from the environment (a .env file is loaded first). Without
// BATCH_BUCKET the folders are read and written under DATA_DIR (default: cwd).
// ------------------------------------------------------------------------------------

import "dotenv/config";

import { handler } from "../src/job_handler";
import { ConfigurationError } from "../src/utils/config";

async function main(): Promise<void> {
  const stage = process.argv[2] ?? "all";
  const summary = await handler({ stage });
  console.log("[job] Done:", JSON.stringify(summary, null, 2));
}

main().catch((err: unknown) => {
  if (err instanceof ConfigurationError) {
    console.error(`[job] Configuration error: ${err.message}`);
    process.exitCode = 2;
    return;
  }
  console.error("[job] Failed:", err);
  process.exitCode = 1;
});
