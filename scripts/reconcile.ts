/**
 * Review and confirm staged records.
 * Usage: npx tsx scripts/reconcile.ts [ID [FIELD...] [--all] [--discard] [--user NAME] [--comments TEXT]]
 */

import "./_loadEnv";
import { loadConfig } from "@/lib/config";
import { createIngestService } from "@/lib/ingest";
import { parseReconcileArgs } from "./_utils/cli";

async function main() {
  const command = parseReconcileArgs(process.argv.slice(2));
  const service = await createIngestService(loadConfig());
  if (!service.ok) {
    console.error(`[reconcile] ${service.message}`);
    process.exit(1);
  }
  const { engine } = service.value;

  switch (command.action) {
    case "list": {
      const pending = await engine.listPending();
      if (pending.length === 0) console.log("No staged records awaiting review");
      for (const p of pending) {
        console.log(`${p.id}\t${p.sector}\t${p.sourceFilename}\trev ${p.revision}\t${p.capturedAt}`);
      }
      return;
    }
    case "review": {
      const review = await engine.review(command.id);
      if (!review.ok) {
        console.error(`[reconcile] ${review.kind}: ${review.message}`);
        process.exit(2);
      }
      console.log(`${command.id}: ${review.value.state}, ${review.value.diffs.length} difference(s)`);
      for (const d of review.value.diffs) {
        console.log(`  ${d.confirmed ? "*" : " "} ${d.field}: ${JSON.stringify(d.stored)} -> ${JSON.stringify(d.incoming)}`);
      }
      return;
    }
    case "discard": {
      const discarded = await engine.discard(command.id);
      if (!discarded.ok) {
        console.error(`[reconcile] ${discarded.kind}: ${discarded.message}`);
        process.exit(2);
      }
      return;
    }
    case "apply": {
      let fields = command.fields;
      if (command.all) {
        const review = await engine.review(command.id);
        if (!review.ok) {
          console.error(`[reconcile] ${review.kind}: ${review.message}`);
          process.exit(2);
        }
        fields = review.value.diffs.map((d) => d.field);
      }
      const outcome = await engine.apply(command.id, fields, { user: command.user, comments: command.comments });
      console.log(JSON.stringify(outcome, null, 2));
      if (!outcome.ok) process.exit(2);
      return;
    }
  }
}

main().catch((err) => {
  console.error(err);
  process.exit(1);
});
