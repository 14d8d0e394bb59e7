/**
 * Run a single ticket through the pipeline
 *
 * Usage:
 *   npx tsx scripts/run-ticket.ts "<subject>" "<description>"
 *   npx tsx scripts/run-ticket.ts --mermaid
 */

import "dotenv/config";
import { createPipeline, toMermaid } from "../src/lib/pipeline";
import { loadSettings } from "../src/lib/settings";
import { PipelineError } from "../src/lib/tickets";

async function main() {
  const args = process.argv.slice(2);

  if (args.includes("--mermaid")) {
    console.log(toMermaid());
    return;
  }

  const [subject, description] = args;
  if (!subject || !description) {
    console.error('Usage: npx tsx scripts/run-ticket.ts "<subject>" "<description>"');
    process.exit(1);
  }

  const pipeline = createPipeline(loadSettings());
  const finalState = await pipeline.run({ subject, description });

  console.log("\nFinal state:\n");
  console.log(JSON.stringify(finalState, null, 2));

  if (finalState.escalated) {
    console.log(`\nEscalated after ${finalState.attempts} failed attempts.`);
  }
}

main().catch((error: unknown) => {
  if (error instanceof PipelineError) {
    console.error(`Ticket aborted at ${error.stage}: ${error.message}`);
  } else {
    console.error(error);
  }
  process.exit(1);
});
