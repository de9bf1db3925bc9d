/**
 * Parsing of control-channel commands.
 *
 * A command is a single line of command-line style options, e.g.
 *
 *   -g boxgen -n 20 --seed 17 --configKeyValues "boxgen.number=50"
 *   --stop
 *
 * Values may not contain whitespace.
 */

import { Command, CommanderError, InvalidArgumentError } from 'commander';
import type { ReconfigRequest, RunConfigOverrides } from '../../shared/types/run-config.js';
import { formatError } from '../../shared/lib/errors.js';

type ReconfigOptions = RunConfigOverrides & { stop?: boolean };

function parseInteger(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed)) {
    throw new InvalidArgumentError('Not an integer.');
  }
  return parsed;
}

function parseCount(value: string): number {
  const parsed = parseInteger(value);
  if (parsed < 0) {
    throw new InvalidArgumentError('Must not be negative.');
  }
  return parsed;
}

function parseChunkSize(value: string): number {
  const parsed = parseInteger(value);
  if (parsed < 1) {
    throw new InvalidArgumentError('Must be at least 1.');
  }
  return parsed;
}

function buildParser(): Command {
  return new Command('reconfig')
    .exitOverride()
    .configureOutput({ writeOut: () => undefined, writeErr: () => undefined })
    .option('--stop', 'stop the server instead of reconfiguring it')
    .option('-g, --generator <name>', 'generator of the next cycle')
    .option('-t, --trigger <name>', 'event trigger')
    .option('-n, --nEvents <count>', 'number of events to serve', parseCount)
    .option('--seed <seed>', 'initial seed, negative to derive one', parseInteger)
    .option('--chunkSize <size>', 'primaries per chunk', parseChunkSize)
    .option('--configFile <path>', 'JSON generator parameter file')
    .option('--configKeyValues <pairs>', 'scope.key=value;... parameter overrides')
    .option('--extKinFile <path>', 'external kinematics input')
    .option('--embedIntoFile <path>', 'background event headers to embed into');
}

export function tokenizeCommand(command: string): string[] {
  return command
    .trim()
    .split(/\s+/)
    .filter((token) => token.length > 0)
    .map((token) => token.replace(/^"(.*)"$/, '$1'));
}

export function parseReconfigCommand(command: string):
  { success: true; request: ReconfigRequest } | { success: false; error: string } {
  const tokens = tokenizeCommand(command);
  if (tokens.length === 0) {
    return { success: false, error: 'Empty control command' };
  }

  const parser = buildParser();
  try {
    parser.parse(tokens, { from: 'user' });
  } catch (err) {
    const message = err instanceof CommanderError ? err.message.replace(/^error: /, '') : formatError(err);
    return { success: false, error: message };
  }
  if (parser.args.length > 0) {
    return { success: false, error: `Unexpected arguments: ${parser.args.join(' ')}` };
  }

  const { stop, ...overrides } = parser.opts<ReconfigOptions>();
  if (stop) {
    return { success: true, request: { kind: 'stop' } };
  }
  return { success: true, request: { kind: 'reconfigure', overrides } };
}
