#!/usr/bin/env node
import { writeFile } from 'node:fs/promises';
import process from 'node:process';
import { pathToFileURL } from 'node:url';
import { CircuitJobsClient } from './client';
import { loadConfigFromEnv } from './config';
import { loadProgram } from './circuit/loader';
import { CliUsageError } from './errors';
import type { CircuitJobsOverrides } from './types';

export type CliCommand =
  | { kind: 'help' }
  | { kind: 'ping' }
  | { kind: 'run'; input: string; output?: string; target?: string; shots?: number };

export function usage(): string {
  return [
    'Usage:',
    '  circuit-jobs --ping',
    '  circuit-jobs --input <program.json> [--output <file>] [--target <name>] [--shots <n>]',
    '',
    'Flags:',
    '  --ping, -p    Test the API connection.',
    '  --input, -i   Program file to run.',
    '  --output, -o  Where to write the samples. Defaults to stdout.',
    '  --target      Target device; overrides the one named in the program file.',
    '  --shots       Number of shots; overrides the program file (default 1).',
    '',
    'Configuration is read from CIRCUIT_JOBS_TOKEN, CIRCUIT_JOBS_HOST, CIRCUIT_JOBS_PORT,',
    'CIRCUIT_JOBS_USE_SSL, CIRCUIT_JOBS_TIMEOUT_MS, CIRCUIT_JOBS_POLL_INTERVAL_MS and CIRCUIT_JOBS_LOG_LEVEL.'
  ].join('\n');
}

const VALUE_FLAGS = new Set(['--input', '-i', '--output', '-o', '--target', '--shots']);

export function parseCliArgs(argv: string[]): CliCommand {
  let ping = false;
  let input: string | undefined;
  let output: string | undefined;
  let target: string | undefined;
  let shots: number | undefined;

  for (let index = 0; index < argv.length; index += 1) {
    const arg = argv[index];
    if (arg === '--help' || arg === '-h') return { kind: 'help' };

    if (arg === '--ping' || arg === '-p') {
      ping = true;
      continue;
    }
    if (!VALUE_FLAGS.has(arg)) {
      throw new CliUsageError(`Unknown argument: ${arg}`);
    }

    const next = argv[index + 1];
    if (next === undefined || next.startsWith('-')) {
      throw new CliUsageError(`Missing value for ${arg}`);
    }
    index += 1;

    if (arg === '--input' || arg === '-i') input = next;
    else if (arg === '--output' || arg === '-o') output = next;
    else if (arg === '--target') target = next;
    else {
      shots = Number(next);
      if (!Number.isInteger(shots) || shots <= 0) throw new CliUsageError(`--shots must be a positive integer, got ${next}`);
    }
  }

  if (ping && input !== undefined) throw new CliUsageError('--ping and --input are mutually exclusive');
  if (ping) return { kind: 'ping' };
  if (input === undefined) throw new CliUsageError('one of --ping or --input is required');
  return { kind: 'run', input, output, target, shots };
}

export async function runCli(
  argv: string[],
  env: Record<string, string | undefined> = process.env,
  overrides: CircuitJobsOverrides = {}
): Promise<number> {
  const command = parseCliArgs(argv);
  if (command.kind === 'help') {
    process.stdout.write(`${usage()}\n`);
    return 0;
  }

  const client = new CircuitJobsClient({ ...loadConfigFromEnv(env), ...overrides });

  if (command.kind === 'ping') {
    if (await client.connection.ping()) {
      process.stdout.write('You have successfully authenticated to the platform!\n');
      return 0;
    }
    process.stderr.write(`Could not reach the platform at ${client.connection.baseUrl}\n`);
    return 1;
  }

  const file = await loadProgram(command.input);
  const target = command.target ?? file.target?.name;
  if (!target) throw new CliUsageError('no target given: pass --target or name one in the program file');
  const shots = command.shots ?? file.target?.shots ?? 1;

  const controller = new AbortController();
  const onInterrupt = () => controller.abort();
  process.once('SIGINT', onInterrupt);

  try {
    process.stdout.write('Executing program on remote hardware...\n');
    const result = await client.engine(target).run(file.program, { shots, signal: controller.signal });
    const text = JSON.stringify(result.samples);
    if (command.output) {
      await writeFile(command.output, `${text}\n`, 'utf8');
    } else {
      process.stdout.write(`${text}\n`);
    }
    return 0;
  } finally {
    process.off('SIGINT', onInterrupt);
  }
}

async function main() {
  try {
    process.exitCode = await runCli(process.argv.slice(2));
  } catch (err) {
    if (err instanceof CliUsageError) {
      console.error(`${err.message}\n\n${usage()}`);
    } else {
      console.error('circuit-jobs failed', err);
    }
    process.exitCode = 1;
  }
}

if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  void main();
}
