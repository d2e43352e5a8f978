#!/usr/bin/env node
import { z } from 'zod';
import { runArgsSchema, runFetchAction } from './actions/run.js';

type ParsedArgs = {
  command: string;
  options: Record<string, string>;
};

const cliInputSchema = z.discriminatedUnion('command', [
  z.object({
    command: z.literal('help'),
    options: z.record(z.string(), z.string()),
  }),
  z.object({
    command: z.literal('run'),
    options: z.record(z.string(), z.string()),
  }),
]);

function parseArgs(argv: string[]): ParsedArgs {
  const [rawCommand, ...rest] = argv;
  const command = normalizeCommand(rawCommand);
  const options: Record<string, string> = {};

  for (let index = 0; index < rest.length; index += 1) {
    const arg = rest[index];
    if (!arg?.startsWith('--')) {
      continue;
    }

    const [key, maybeValue] = arg.slice(2).split('=', 2);
    if (!key) {
      continue;
    }

    if (maybeValue !== undefined) {
      options[key] = maybeValue;
      continue;
    }

    const next = rest[index + 1];
    if (next && !next.startsWith('--')) {
      options[key] = next;
      index += 1;
      continue;
    }

    options[key] = 'true';
  }

  return { command, options };
}

function normalizeCommand(command?: string): string {
  if (
    !command ||
    command === 'help' ||
    command === '--help' ||
    command === '-h'
  ) {
    return 'help';
  }

  return command;
}

function printHelp(): void {
  console.log(`fanout-fetch CLI

Usage:
  fanout-fetch help
  fanout-fetch run --tasks="./tasks.json"
  fanout-fetch run --tasks="./tasks.json" --retries=3 --retryDelay=500
  fanout-fetch run --tasks="./tasks.json" --timeout=2000 --serviceName=billing
  fanout-fetch run --tasks="./tasks.json" --caFile="./certs/internal-ca.pem"
  fanout-fetch run --tasks="./tasks.json" --outputFile="./tmp/results.json" --pretty

Commands:
  help    Show this help message
  run     Fetch every task of a tasks file concurrently and print the results

Run options:
  --tasks       Required. JSON file mapping task names to { url, method, body, headers,
                apiKey, query, responseDecoding, timeoutMs, numRetries, doNotWait,
                failSilently, languageCode, autodetectContentType }.
  --timeout     Optional. Per-attempt timeout in ms for tasks without their own (default: 10000).
  --retries     Optional. Attempts per task for tasks without their own (default: 0, i.e. one attempt).
  --retryDelay  Optional. Fixed wait between attempts in ms (default: 1000).
  --serviceName Optional. Service name reported in errors (default: api).
  --caFile      Optional. PEM bundle of extra trusted certificate authorities.
  --outputFile  Optional. Writes JSON output to the given file path.
  --pretty      Optional. Pretty-print JSON output.

Environment:
  FETCHER_TIMEOUT_MS, FETCHER_NUM_RETRIES, FETCHER_RETRY_DELAY_MS, FETCHER_SERVICE_NAME,
  FETCHER_CA_FILE, FETCHER_KEEPALIVE_TIMEOUT_MS, FETCHER_DEBUG=true (single attempt per task).
  LOG_LEVEL (default: info), LOG_PRETTY.
`);
}

async function main(): Promise<number> {
  const { command, options } = parseArgs(process.argv.slice(2));
  const parsedCliInput = cliInputSchema.safeParse({ command, options });

  if (!parsedCliInput.success) {
    console.error(`Unknown command: ${command}`);
    printHelp();
    return 1;
  }

  if (parsedCliInput.data.command === 'help') {
    printHelp();
    return 0;
  }

  const parsedRunArgs = runArgsSchema.safeParse(parsedCliInput.data.options);
  if (!parsedRunArgs.success) {
    console.error(parsedRunArgs.error.issues[0]?.message ?? 'Invalid arguments');
    printHelp();
    return 1;
  }

  return runFetchAction(parsedRunArgs.data);
}

const exitCode = await main();
process.exitCode = exitCode;
