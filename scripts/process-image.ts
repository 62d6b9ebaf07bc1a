#!/usr/bin/env npx tsx
/**
 * Run a single captured frame + caption through the pipeline, without the HTTP server
 */
import path from 'path';
import { PipelineCoordinator } from '../src/lib/coordinator';
import { loadConfigFromEnvironment, type EnvOverrides } from '../src/lib/config';
import { ConfigError } from '../src/lib/errors';
import { createCaptureEvent, EventRejectedError } from '../src/lib/events';
import { recordStatus, summarizeRecord } from '../src/lib/record';

function printHelp() {
  console.log(`
Usage: npx tsx scripts/process-image.ts -i <image> -c <caption> [options]

Endpoints and budgets come from the environment / .env, as for scripts/relay.ts.

Options:
  -i, --image <path>          Captured frame
  -c, --caption <text>        Caption for the frame
      --prompts-url <url>     Prompt extraction endpoint (overrides PROMPTS_URL)
      --detection-url <url>   Detection endpoint (overrides DETECTION_URL)
      --ingest-url <url>      Ingest sink (overrides INGEST_URL)
      --no-publish            Do not contact any sink
      --json                  Print the record summary as JSON
  -h, --help                  Show help

Exit status: 0 published, 1 failed, 2 processed but publishing failed.
`);
}

function requireValue(args: string[], index: number, flag: string): string {
  const value = args[index + 1];
  if (value === undefined || (value.startsWith('-') && value.length > 1)) {
    console.error(`❌ Missing value for ${flag}`);
    process.exit(1);
  }
  return value;
}

type CLIConfig = {
  imagePath: string;
  caption: string | null;
  publish: boolean;
  json: boolean;
  overrides: EnvOverrides;
};

function parseArgs(): CLIConfig {
  const args = process.argv.slice(2);
  const config: CLIConfig = { imagePath: '', caption: null, publish: true, json: false, overrides: {} };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    switch (arg) {
      case '-i':
      case '--image':
        config.imagePath = requireValue(args, i, arg);
        i++;
        break;
      case '-c':
      case '--caption':
        config.caption = requireValue(args, i, arg);
        i++;
        break;
      case '--prompts-url':
        config.overrides.PROMPTS_URL = requireValue(args, i, arg);
        i++;
        break;
      case '--detection-url':
        config.overrides.DETECTION_URL = requireValue(args, i, arg);
        i++;
        break;
      case '--ingest-url':
        config.overrides.INGEST_URL = requireValue(args, i, arg);
        i++;
        break;
      case '--no-publish':
        config.publish = false;
        break;
      case '--json':
        config.json = true;
        break;
      case '-h':
      case '--help':
        printHelp();
        process.exit(0);
      default:
        console.warn(`⚠️ Unknown argument ignored: ${arg}`);
    }
  }

  if (!config.imagePath || config.caption === null) {
    console.error(`❌ Both --image and --caption are required.`);
    console.error(`   Usage: npx tsx scripts/process-image.ts -i <image> -c <caption>`);
    process.exit(1);
  }
  return config;
}

async function main() {
  const cli = parseArgs();
  const imagePath = path.resolve(cli.imagePath);

  const overrides: EnvOverrides = { CAPTURES_ROOT: path.dirname(imagePath), ...cli.overrides };
  if (!cli.publish) {
    overrides.INGEST_URL = '';
    overrides.DASHBOARD_REFRESH_URL = '';
  }

  let coordinator: PipelineCoordinator;
  try {
    const config = loadConfigFromEnvironment(overrides);
    coordinator = PipelineCoordinator.fromConfig(config);
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error(`❌ ${error.message}`);
      process.exit(1);
    }
    throw error;
  }

  const event = await createCaptureEvent(path.dirname(imagePath), {
    image_path: path.basename(imagePath),
    caption: cli.caption ?? '',
  });

  console.log(`🚀 Processing ${imagePath}`);
  const record = await coordinator.submit(event);
  await coordinator.close();

  const summary = summarizeRecord(record);
  if (cli.json) {
    console.log(JSON.stringify(summary, null, 2));
  } else {
    console.log(`   Status:    ${summary.status} (${summary.state})`);
    console.log(`   Objects:   ${(summary.objects ?? []).join(', ') || '(none)'}`);
    console.log(`   Boxes:     ${summary.detections?.length ?? 0}`);
    console.log(`   Artifact:  ${summary.artifact_path ?? '(none)'}`);
    if (summary.failure) {
      console.log(`   Failure:   ${summary.failure.stage} [${summary.failure.kind}] ${summary.failure.message}`);
    }
  }

  const status = recordStatus(record);
  if (status === 'failed') process.exit(1);
  if (status === 'publish_failed') process.exit(2);
  console.log(`\n🎉 Done!`);
}

main().catch((error: unknown) => {
  if (error instanceof EventRejectedError) {
    console.error(`❌ ${error.message}`);
    process.exit(1);
  }
  console.error(`❌ ${error instanceof Error ? error.message : String(error)}`);
  if (error instanceof Error && error.stack) {
    console.error(error.stack);
  }
  process.exit(1);
});
