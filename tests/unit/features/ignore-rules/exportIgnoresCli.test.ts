/**
 * Tests for export-ignores argument parsing
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import path from 'path';
import type { Command } from 'commander';
import { createExportIgnoresCommand } from '@/features/ignore-rules/commands/exportIgnores.js';
import { ConfigLoader } from '@/shared/config/ConfigLoader.js';
import { FakeFossaClient, MemoryFileSystem, silentLogger } from '../../../helpers/fakes.js';

function setup() {
  const client = new FakeFossaClient([], [[{ id: 1 }]]);
  const fs = new MemoryFileSystem();
  const createClient = vi.fn(() => client);
  const command = createExportIgnoresCommand({
    configLoader: new ConfigLoader(new MemoryFileSystem()),
    fs,
    createClient,
    createLogger: () => silentLogger(),
    spinner: false,
  })
    .exitOverride()
    .configureOutput({ writeOut: () => undefined, writeErr: () => undefined });

  const run = (...args: string[]): Promise<Command> =>
    command.parseAsync(['node', 'fossa-tools', ...args]);

  return { client, fs, createClient, run };
}

describe('export-ignores command', () => {
  beforeEach(() => {
    vi.spyOn(process, 'exit').mockImplementation((code) => {
      throw new Error(`process.exit(${code})`);
    });
  });

  it('should default to licensing rules, 1000 per page, as JSON', async () => {
    const { client, fs, createClient, run } = setup();

    await expect(run('test-secret')).rejects.toThrow('process.exit(0)');

    expect(createClient).toHaveBeenCalledWith(expect.anything(), 'test-secret');
    expect(client.pageRequests).toEqual([{ category: 'licensing', page: 1, count: 1000 }]);
    expect(fs.files.get(path.resolve('paginated_results.json'))).toBe(
      JSON.stringify([{ id: 1 }], null, 2)
    );
  });

  it('should pass category, count, format and output file through', async () => {
    const { client, fs, run } = setup();
    const out = path.resolve('exports', 'security.csv');

    await expect(
      run('test-secret', '--category', 'security', '--count', '5', '--output', 'csv', '--out', out)
    ).rejects.toThrow('process.exit(0)');

    expect(client.pageRequests).toEqual([{ category: 'security', page: 1, count: 5 }]);
    expect(fs.files.get(out)).toBe('id\r\n1\r\n');
  });

  it('should only accept licensing or security as the category', async () => {
    const { createClient, run } = setup();

    await expect(run('test-secret', '--category', 'quality')).rejects.toMatchObject({
      code: 'commander.invalidArgument',
    });
    expect(createClient).not.toHaveBeenCalled();
  });

  it('should reject a page size of 0', async () => {
    const { createClient, run } = setup();

    await expect(run('test-secret', '--count', '0')).rejects.toMatchObject({
      code: 'commander.invalidArgument',
    });
    expect(createClient).not.toHaveBeenCalled();
  });

  it('should only accept json or csv as the output format', async () => {
    const { run } = setup();

    await expect(run('test-secret', '--output', 'xml')).rejects.toMatchObject({
      code: 'commander.invalidArgument',
    });
  });
});
