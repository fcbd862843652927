/**
 * Assemble and route spreadsheet uploads with the switches from the environment.
 * Usage: npx tsx scripts/ingest.ts path/to/upload.xlsx [more.xlsx ...]
 */

import "./_loadEnv";
import { loadConfig } from "@/lib/config";
import { createIngestService, ingestFile } from "@/lib/ingest";

async function main() {
  const files = process.argv.slice(2).filter((a) => !a.startsWith("--"));
  if (files.length === 0) {
    console.error("Usage: npx tsx scripts/ingest.ts FILE [FILE...]");
    process.exit(1);
  }

  const service = await createIngestService(loadConfig());
  if (!service.ok) {
    console.error(`[ingest] ${service.message}`);
    process.exit(1);
  }

  let failures = 0;
  for (const file of files) {
    const outcome = await ingestFile(service.value, file, { user: process.env.USER ?? "cli" });
    console.log(JSON.stringify({ file, ...outcome }, null, 2));
    if (!outcome.ok) failures++;
  }
  process.exit(failures > 0 ? 2 : 0);
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
