#!/usr/bin/env node
/**
 * fossa-tools CLI entry point
 */

import { Command } from 'commander';
import { FileSystemAdapter } from './platform/FileSystemAdapter.js';
import { ProcessExecutorAdapter } from './platform/ProcessExecutorAdapter.js';
import { ConfigLoader } from './shared/config/ConfigLoader.js';
import { createTeamCommand } from './features/teams/commands/team.js';
import { createExportIgnoresCommand } from './features/ignore-rules/commands/exportIgnores.js';

// Initialize dependencies
const fs = new FileSystemAdapter();
const executor = new ProcessExecutorAdapter();
const configLoader = new ConfigLoader(fs);

const program = new Command();

program
  .name('fossa-tools')
  .description('FOSSA helpers for CI/CD pipelines: team provisioning, analysis, ignore-rule export')
  .version('0.1.0');

program.addCommand(createTeamCommand({ configLoader, executor }));
program.addCommand(createExportIgnoresCommand({ configLoader, fs }));

await program.parseAsync(process.argv);
