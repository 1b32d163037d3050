#!/usr/bin/env node
import { PipelineOrchestrator } from "../src/application/pipelineOrchestrator";
import { ConfigurationError, formatError } from "../src/domain/errors";
import type { RunReport } from "../src/domain/types";
import { loadConfig } from "../src/infrastructure/config";
import { getDependencies } from "../src/infrastructure/container";
import { parseArgs, toRunRequest } from "./cliArgs";

// Usage examples:
//  - npx tsx scripts/runPipeline.ts --input=./samples/episode.mp4
//  - npx tsx scripts/runPipeline.ts --input=https://www.youtube.com/watch?v=XXXXX --maxReels=3 --platforms=tiktok,instagram
//  - npx tsx scripts/runPipeline.ts --input=./samples/episode.mp4 --enqueue (a worker picks it up)
//  - npx tsx scripts/runPipeline.ts --input=./samples/episode.mp4 --focusSpeaker="Speaker B"

function printReport(report: RunReport) {
  for (const reel of report.reels) {
    console.log(`reel #${reel.rank} ${reel.platform} score=${reel.viralityScore} ${reel.durationSeconds.toFixed(1)}s ${reel.path}`);
  }
  for (const failure of report.failures) {
    const platform = failure.platform ? ` (${failure.platform})` : "";
    console.log(`failed ${failure.highlightId} at ${failure.stage}${platform} [${failure.kind}]: ${failure.message}`);
  }
  if (report.error) {
    console.log(`aborted at ${report.error.stage ?? "start"} [${report.error.kind}]: ${report.error.message}`);
  }
  console.log(
    `Run ${report.runId} ${report.state}: ${report.reels.length} reel(s), average score ${report.averageViralityScore.toFixed(2)}, ${(report.durationMs / 1000).toFixed(1)}s.`
  );
}

async function main() {
  const args = parseArgs(process.argv.slice(2));
  const config = loadConfig();
  const deps = getDependencies(config);
  const orchestrator = new PipelineOrchestrator(deps);
  const request = toRunRequest(args, config.clipWorkers);

  if (args.enqueue) {
    try {
      const runId = await orchestrator.enqueue(request);
      console.log(`Queued run ${runId}.`);
    } finally {
      await deps.queue.close();
    }
    return 0;
  }

  const controller = new AbortController();
  process.once("SIGINT", () => {
    console.log("Cancelling run...");
    controller.abort();
  });

  const report = await orchestrator.run(request, { signal: controller.signal });
  printReport(report);
  if (report.error?.kind === "configuration") {
    return 2;
  }
  return report.state === "completed" ? 0 : 1;
}

main()
  .then((code) => process.exit(code))
  .catch((err) => {
    console.error(formatError(err));
    process.exit(err instanceof ConfigurationError ? 2 : 1);
  });
