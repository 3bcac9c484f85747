/**
 * Tests for team command argument parsing
 */

import { describe, it, expect, vi, beforeEach } from 'vitest';
import type { Command } from 'commander';
import { createTeamCommand } from '@/features/teams/commands/team.js';
import { ConfigLoader } from '@/shared/config/ConfigLoader.js';
import type { IProcessExecutor } from '@/platform/IProcessExecutor.js';
import {
  FakeAnalyzer,
  FakeFossaClient,
  MemoryFileSystem,
  silentLogger,
} from '../../../helpers/fakes.js';

const unusedExecutor: IProcessExecutor = {
  execute: async () => {
    throw new Error('executor should not be used');
  },
};

function setup() {
  const client = new FakeFossaClient();
  const analyzer = new FakeAnalyzer();
  const createClient = vi.fn(() => client);
  const command = createTeamCommand({
    configLoader: new ConfigLoader(new MemoryFileSystem()),
    executor: unusedExecutor,
    createClient,
    createAnalyzer: () => analyzer,
    createLogger: () => silentLogger(),
  })
    .exitOverride()
    .configureOutput({ writeOut: () => undefined, writeErr: () => undefined });

  const run = (...args: string[]): Promise<Command> =>
    command.parseAsync(['node', 'fossa-tools', ...args]);

  return { client, analyzer, createClient, run };
}

describe('team command', () => {
  beforeEach(() => {
    vi.stubEnv('FOSSA_API_KEY', 'test-secret');
    vi.stubEnv('FOSSA_ENDPOINT', 'https://fossa.test');
    vi.spyOn(process, 'exit').mockImplementation((code) => {
      throw new Error(`process.exit(${code})`);
    });
  });

  it('should provision and analyze without mode flags', async () => {
    const { client, analyzer, run } = setup();

    await expect(run('New Team')).rejects.toThrow('process.exit(0)');

    expect(client.createRequests).toEqual([{ name: 'New Team', autoAddUsers: false }]);
    expect(analyzer.runPrimary).toHaveBeenCalledWith('New Team');
    expect(analyzer.runSecondary).toHaveBeenCalledTimes(1);
  });

  it('should map --create-only to a run without analysis', async () => {
    const { client, analyzer, run } = setup();

    await expect(run('New Team', '--create-only')).rejects.toThrow('process.exit(0)');

    expect(client.createRequests).toEqual([{ name: 'New Team', autoAddUsers: false }]);
    expect(analyzer.isAvailable).not.toHaveBeenCalled();
    expect(analyzer.runPrimary).not.toHaveBeenCalled();
  });

  it('should map --analyze-only to a run without provisioning', async () => {
    const { client, analyzer, run } = setup();

    await expect(run('Existing Team', '--analyze-only')).rejects.toThrow('process.exit(0)');

    expect(client.teams.list).not.toHaveBeenCalled();
    expect(analyzer.runPrimary).toHaveBeenCalledWith('Existing Team');
  });

  it('should refuse --create-only together with --analyze-only', async () => {
    const { createClient, run } = setup();

    await expect(run('New Team', '--create-only', '--analyze-only')).rejects.toMatchObject({
      code: 'commander.conflictingOption',
    });
    expect(createClient).not.toHaveBeenCalled();
  });

  it('should require a team name', async () => {
    const { createClient, run } = setup();

    await expect(run()).rejects.toMatchObject({ code: 'commander.missingArgument' });
    expect(createClient).not.toHaveBeenCalled();
  });
});
