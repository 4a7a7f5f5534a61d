import { readFile } from 'fs/promises';
import { z } from 'zod';
import { TaskRequest } from '../application/ports/output/task-service.port';

export const USAGE = 'Usage: async-task-poller <task-request.json> [--output <outcome.json>]';

export interface CliArgs {
  requestPath: string;
  outputPath?: string;
}

export class CliUsageError extends Error {
  constructor(message: string) {
    super(`${message}\n${USAGE}`);
    this.name = 'CliUsageError';
  }
}

/**
 * Parse the arguments after the script name.
 */
export function parseCliArgs(argv: readonly string[]): CliArgs {
  let requestPath: string | undefined;
  let outputPath: string | undefined;

  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];

    if (arg === '--output' || arg === '-o') {
      const value = argv[i + 1];
      if (!value || value.startsWith('-')) {
        throw new CliUsageError(`Missing value for ${arg}`);
      }
      outputPath = value;
      i++;
    } else if (arg.startsWith('--output=')) {
      outputPath = arg.slice('--output='.length);
    } else if (arg.startsWith('-')) {
      throw new CliUsageError(`Unknown option ${arg}`);
    } else if (requestPath === undefined) {
      requestPath = arg;
    } else {
      throw new CliUsageError(`Unexpected argument ${arg}`);
    }
  }

  if (!requestPath) {
    throw new CliUsageError('Missing task request file');
  }

  return { requestPath, outputPath: outputPath || undefined };
}

const taskRequestSchema = z.record(z.unknown());

/**
 * Read a task request from a JSON file. The file must hold a JSON object.
 */
export async function loadTaskRequest(path: string): Promise<TaskRequest> {
  let text: string;
  try {
    text = await readFile(path, 'utf-8');
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new CliUsageError(`Task request ${path} could not be read: ${message}`);
  }

  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new CliUsageError(`Task request ${path} is not valid JSON: ${message}`);
  }

  const parsed = taskRequestSchema.safeParse(json);
  if (!parsed.success) {
    throw new CliUsageError(`Task request ${path} must be a JSON object`);
  }

  return Object.freeze(parsed.data);
}
