#!/usr/bin/env npx tsx
/**
 * Pipeline Runner CLI
 *
 * Usage:
 *   npx tsx scripts/run-pipeline.ts --regions "渋谷,大阪"            # Scrape, verify and publish
 *   npx tsx scripts/run-pipeline.ts --regions "渋谷,大阪" --preview  # Scrape and verify only
 *
 * Ctrl+C once asks the run to stop at the next stage boundary; twice exits.
 */

import { getConfig } from '@/lib/config';
import { errorMessage } from '@/lib/errors';
import { createPipeline } from '@/lib/pipeline';
import { RunStatus, type RunSummary } from '@/types';

interface CliArgs {
  regions?: string;
  preview: boolean;
  help: boolean;
}

function readArgs(argv: string[]): CliArgs {
  const args: CliArgs = { preview: false, help: false };
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === '--preview') args.preview = true;
    else if (arg === '--help' || arg === '-h') args.help = true;
    else if (arg === '--regions') args.regions = argv[++i];
    else if (arg.startsWith('--regions=')) args.regions = arg.slice('--regions='.length);
  }
  return args;
}

function showHelp() {
  console.log(`
Clinic Lead Pipeline

Usage:
  npx tsx scripts/run-pipeline.ts --regions "<region>[,<region>...]" [--preview]

Options:
  --regions   Comma-separated regions (、 also separates)
  --preview   Verify without writing to the sheet
  --help      Show this help
`);
}

function printSummary(summary: RunSummary) {
  const { totals } = summary;
  console.log('\n================================================');
  console.log(`🏁 Run ${summary.runId}: ${summary.status}${summary.previewMode ? ' (preview)' : ''}`);
  console.log(`   Regions processed: ${summary.regionsProcessed}`);
  console.log(`   Found: ${totals.found}  Excluded: ${totals.excluded}  Qualified: ${totals.verifiedQualified}`);
  console.log(`   Published: ${totals.published}  Duplicates: ${totals.duplicates}  Verification failed: ${totals.verificationFailed}`);

  for (const region of summary.regions) {
    const failure = region.error ? ` - ${region.error.kind}: ${region.error.message}` : '';
    console.log(`   • ${region.region}: ${region.status}${failure}`);
  }

  if (summary.previewMode) {
    for (const region of summary.regions) {
      for (const candidate of region.qualified) {
        console.log(`     ✅ ${candidate.name} | ${candidate.address} | ${candidate.phone} | ${candidate.website}`);
      }
    }
  }

  if (summary.errors.length > 0) {
    console.log(`\n⚠️  Errors (${summary.errors.length}):`);
    for (const error of summary.errors) {
      const where = [error.region, error.stage, error.candidate].filter(Boolean).join(' / ');
      console.log(`   - [${error.kind}]${where ? ` ${where}:` : ''} ${error.message}`);
    }
  }
  console.log('================================================\n');
}

async function main(): Promise<number> {
  const args = readArgs(process.argv.slice(2));
  if (args.help || !args.regions) {
    showHelp();
    return args.help ? 0 : 1;
  }

  const config = getConfig();
  const pipeline = createPipeline(config, { publishing: !args.preview });

  try {
    const run = pipeline.orchestrator.startRun({ regions: args.regions, previewMode: args.preview });

    // Handle graceful shutdown
    let interrupted = false;
    process.on('SIGINT', () => {
      if (interrupted) {
        console.log('\n🛑 Forced exit');
        process.exit(130);
      }
      interrupted = true;
      console.log('\n🛑 Cancelling run - finishing the current stage (Ctrl+C again to force exit)');
      run.cancel();
    });

    const summary = await run.summary;
    printSummary(summary);
    return summary.status === RunStatus.COMPLETED ? 0 : 1;
  } finally {
    await pipeline.shutdown();
  }
}

main()
  .then((code) => process.exit(code))
  .catch((error) => {
    console.error('❌ Pipeline failed to start:', errorMessage(error));
    process.exit(1);
  });
