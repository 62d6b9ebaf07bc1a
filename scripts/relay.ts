#!/usr/bin/env npx tsx
/**
 * Relay server: receives captioned frames and drives them through the pipeline
 */
import { PipelineCoordinator } from '../src/lib/coordinator';
import { loadConfigFromEnvironment, type EnvOverrides, type RelayConfig } from '../src/lib/config';
import { ConfigError, formatError } from '../src/lib/errors';
import { closeServer, createRelayServer, listen } from '../src/lib/server';

function printHelp() {
  console.log(`
Usage: npx tsx scripts/relay.ts [options]

Every option can also be set in the environment or a .env file (name in brackets).

Options:
      --host <host>                 Listen host [RELAY_HOST] (default: 0.0.0.0)
      --port <n>                    Listen port [RELAY_PORT] (default: 5050)
      --captures-root <dir>         Where captured frames live [CAPTURES_ROOT]
      --prompts-url <url>           Prompt extraction endpoint [PROMPTS_URL]
      --prompts-timeout-ms <n>      Per-attempt timeout [PROMPTS_TIMEOUT_MS] (default: 20000)
      --prompts-attempts <n>        Attempt budget [PROMPTS_MAX_ATTEMPTS] (default: 3)
      --detection-url <url>         Detection endpoint [DETECTION_URL]
      --detection-timeout-ms <n>    Per-attempt timeout [DETECTION_TIMEOUT_MS] (default: 45000)
      --detection-attempts <n>      Attempt budget [DETECTION_MAX_ATTEMPTS] (default: 7)
      --backoff <fixed|exponential> Delay shape between attempts [BACKOFF_STRATEGY] (default: exponential)
      --backoff-base-ms <n>         First delay [BACKOFF_BASE_MS] (default: 500)
      --backoff-max-ms <n>          Delay cap [BACKOFF_MAX_MS] (default: 6000)
      --annotate-in-service         Use the detection service's annotated image [ANNOTATE_IN_SERVICE]
      --ingest-url <url>            Ingest sink [INGEST_URL]
      --ingest-timeout-ms <n>       [INGEST_TIMEOUT_MS] (default: 8000)
      --ingest-attempts <n>         [INGEST_MAX_ATTEMPTS] (default: 3)
      --refresh-url <url>           Dashboard refresh sink [DASHBOARD_REFRESH_URL]
      --publish-only-with-detections  Skip sinks when nothing was detected [PUBLISH_ONLY_WITH_DETECTIONS]
      --concurrency <n>             Events processed at once [MAX_CONCURRENT_EVENTS] (default: 4)
      --debug                       Verbose logging [DEBUG]
  -h, --help                        Show help
`);
}

function requireValue(args: string[], index: number, flag: string): string {
  const value = args[index + 1];
  if (!value || value.startsWith('-')) {
    console.error(`❌ Missing value for ${flag}`);
    process.exit(1);
  }
  return value;
}

const VALUE_FLAGS: Record<string, keyof EnvOverrides> = {
  '--host': 'RELAY_HOST',
  '--port': 'RELAY_PORT',
  '--captures-root': 'CAPTURES_ROOT',
  '--prompts-url': 'PROMPTS_URL',
  '--prompts-timeout-ms': 'PROMPTS_TIMEOUT_MS',
  '--prompts-attempts': 'PROMPTS_MAX_ATTEMPTS',
  '--detection-url': 'DETECTION_URL',
  '--detection-timeout-ms': 'DETECTION_TIMEOUT_MS',
  '--detection-attempts': 'DETECTION_MAX_ATTEMPTS',
  '--backoff': 'BACKOFF_STRATEGY',
  '--backoff-base-ms': 'BACKOFF_BASE_MS',
  '--backoff-max-ms': 'BACKOFF_MAX_MS',
  '--ingest-url': 'INGEST_URL',
  '--ingest-timeout-ms': 'INGEST_TIMEOUT_MS',
  '--ingest-attempts': 'INGEST_MAX_ATTEMPTS',
  '--refresh-url': 'DASHBOARD_REFRESH_URL',
  '--concurrency': 'MAX_CONCURRENT_EVENTS',
};

const SWITCH_FLAGS: Record<string, keyof EnvOverrides> = {
  '--annotate-in-service': 'ANNOTATE_IN_SERVICE',
  '--publish-only-with-detections': 'PUBLISH_ONLY_WITH_DETECTIONS',
  '--debug': 'DEBUG',
};

function parseArgs(): EnvOverrides {
  const args = process.argv.slice(2);
  const overrides: EnvOverrides = {};

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    if (arg === '-h' || arg === '--help') {
      printHelp();
      process.exit(0);
    }
    const valueKey = VALUE_FLAGS[arg];
    if (valueKey) {
      overrides[valueKey] = requireValue(args, i, arg);
      i++;
      continue;
    }
    const switchKey = SWITCH_FLAGS[arg];
    if (switchKey) {
      overrides[switchKey] = true;
      continue;
    }
    console.warn(`⚠️ Unknown argument ignored: ${arg}`);
  }

  return overrides;
}

function loadConfigOrExit(overrides: EnvOverrides): RelayConfig {
  try {
    return loadConfigFromEnvironment(overrides);
  } catch (error) {
    if (error instanceof ConfigError) {
      console.error(`❌ ${error.message}`);
      process.exit(1);
    }
    throw error;
  }
}

async function main() {
  const config = loadConfigOrExit(parseArgs());
  const coordinator = PipelineCoordinator.fromConfig(config);
  const server = createRelayServer({ coordinator, capturesRoot: config.capturesRoot });

  const port = await listen(server, config.port, config.host);
  console.log(`🚀 Relay listening on ${config.host}:${port}`);
  console.log(`   Captures:  ${config.capturesRoot}`);
  console.log(`   Prompts:   ${config.prompts.url} (timeout ${config.prompts.timeoutMs}ms, ${config.prompts.maxAttempts} attempts)`);
  console.log(`   Detection: ${config.detection.url} (timeout ${config.detection.timeoutMs}ms, ${config.detection.maxAttempts} attempts, annotate=${config.annotateInService ? 1 : 0})`);
  console.log(`   Ingest:    ${config.ingest?.url ?? '(disabled)'}`);
  console.log(`   Dashboard: ${config.dashboardRefresh?.url ?? '(disabled)'}`);

  let shuttingDown = false;
  const shutdown = async (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;
    console.log(`\n🛑 ${signal} received, finishing in-flight events...`);
    await Promise.all([closeServer(server), coordinator.close()]);
    console.log(`👋 Bye`);
    process.exit(0);
  };

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.on(signal, () => {
      shutdown(signal).catch((error: unknown) => {
        console.error(`❌ Shutdown failed: ${formatError(error)}`);
        process.exit(1);
      });
    });
  }
}

main().catch((error: unknown) => {
  console.error(`❌ ${error instanceof Error ? error.message : String(error)}`);
  if (error instanceof Error && error.stack) {
    console.error(error.stack);
  }
  process.exit(1);
});
