import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtemp, rm, writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { CliUsageError, loadTaskRequest, parseCliArgs } from '../../../src/cli/cli-args';

describe('parseCliArgs', () => {
  it('takes the request file as the only positional argument', () => {
    expect(parseCliArgs(['request.json'])).toEqual({
      requestPath: 'request.json',
      outputPath: undefined,
    });
  });

  it.each([
    [['request.json', '--output', 'out.json']],
    [['-o', 'out.json', 'request.json']],
    [['request.json', '--output=out.json']],
  ])('reads the output path from %j', (argv) => {
    expect(parseCliArgs(argv)).toEqual({ requestPath: 'request.json', outputPath: 'out.json' });
  });

  it('requires a request file', () => {
    expect(() => parseCliArgs([])).toThrow(CliUsageError);
    expect(() => parseCliArgs([])).toThrow(/^Missing task request file\nUsage: /);
  });

  it('requires a value after --output', () => {
    expect(() => parseCliArgs(['request.json', '--output'])).toThrow('Missing value for --output');
  });

  it('rejects unknown options', () => {
    expect(() => parseCliArgs(['request.json', '--verbose'])).toThrow('Unknown option --verbose');
  });

  it('rejects a second positional argument', () => {
    expect(() => parseCliArgs(['a.json', 'b.json'])).toThrow('Unexpected argument b.json');
  });
});

describe('loadTaskRequest', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(join(tmpdir(), 'task-request-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  it('returns the request as a frozen object', async () => {
    const path = join(dir, 'request.json');
    await writeFile(path, JSON.stringify({ type: 'ExampleTask', payload: { n: 1 } }), 'utf-8');

    const request = await loadTaskRequest(path);

    expect(request).toEqual({ type: 'ExampleTask', payload: { n: 1 } });
    expect(Object.isFrozen(request)).toBe(true);
  });

  it('rejects a JSON array', async () => {
    const path = join(dir, 'request.json');
    await writeFile(path, '[1, 2]', 'utf-8');

    await expect(loadTaskRequest(path)).rejects.toThrow(`Task request ${path} must be a JSON object`);
  });

  it('rejects invalid JSON', async () => {
    const path = join(dir, 'request.json');
    await writeFile(path, '{ "type": ', 'utf-8');

    await expect(loadTaskRequest(path)).rejects.toThrow(`Task request ${path} is not valid JSON: `);
  });

  it('reports a missing file as a usage error', async () => {
    const path = join(dir, 'missing.json');

    const rejection = loadTaskRequest(path);

    await expect(rejection).rejects.toBeInstanceOf(CliUsageError);
    await expect(rejection).rejects.toThrow(`Task request ${path} could not be read: ENOENT`);
  });
});
