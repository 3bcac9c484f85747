/**
 * Configuration loader with hierarchy support
 * Priority: CLI flags > env vars > project config > defaults
 */

import {
  type Config,
  type ConfigInput,
  type ProjectFileConfig,
  ConfigSchema,
  ProjectFileSchema,
} from './schemas.js';
import type { IFileSystem } from '../../platform/IFileSystem.js';
import { ConfigurationError } from '../utils/errors.js';
import yaml from 'yaml';
import dotenv from 'dotenv';
import path from 'path';
import { ZodError } from 'zod';

export const PROJECT_CONFIG_FILE = '.fossa-tools.yml';

export interface ConfigLoadOptions {
  projectRoot?: string;
  cliFlags?: Partial<ConfigInput>;
  /**
   * Environment to read from. Defaults to process.env.
   */
  env?: NodeJS.ProcessEnv;
}

function formatZodError(error: ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    .join('; ');
}

export class ConfigLoader {
  constructor(private fs: IFileSystem) {}

  /**
   * Load configuration with full hierarchy:
   * 1. Defaults (schema)
   * 2. Project (.fossa-tools.yml)
   * 3. Environment variables (.env file, then the real environment)
   * 4. CLI flags
   *
   * The result is frozen; it is built once per run and passed explicitly.
   */
  async load(options: ConfigLoadOptions = {}): Promise<Config> {
    const projectRoot = options.projectRoot ?? process.cwd();

    const projectConfig = await this.loadProjectConfig(projectRoot);
    const envConfig = this.mapEnv(await this.loadEnv(projectRoot, options.env ?? process.env));

    const merged = this.merge(this.merge(projectConfig, envConfig), options.cliFlags ?? {});

    const parsed = ConfigSchema.safeParse(merged);
    if (!parsed.success) {
      throw new ConfigurationError(`Invalid configuration: ${formatZodError(parsed.error)}`);
    }

    return Object.freeze(parsed.data);
  }

  private async loadProjectConfig(projectRoot: string): Promise<ProjectFileConfig> {
    const configPath = path.join(projectRoot, PROJECT_CONFIG_FILE);
    if (!(await this.fs.exists(configPath))) {
      return {};
    }

    let raw: unknown;
    try {
      raw = yaml.parse(await this.fs.readFile(configPath));
    } catch (error) {
      throw new ConfigurationError(
        `Failed to parse ${configPath}: ${error instanceof Error ? error.message : String(error)}`
      );
    }

    // An empty file parses to null
    const parsed = ProjectFileSchema.safeParse(raw ?? {});
    if (!parsed.success) {
      throw new ConfigurationError(`Invalid ${configPath}: ${formatZodError(parsed.error)}`);
    }
    return parsed.data;
  }

  /**
   * Values from a project `.env` file never override the real environment.
   */
  private async loadEnv(projectRoot: string, env: NodeJS.ProcessEnv): Promise<NodeJS.ProcessEnv> {
    const envPath = path.join(projectRoot, '.env');
    if (!(await this.fs.exists(envPath))) {
      return env;
    }
    const fileEnv = dotenv.parse(await this.fs.readFile(envPath));
    return { ...fileEnv, ...env };
  }

  private mapEnv(env: NodeJS.ProcessEnv): Partial<ConfigInput> {
    const envConfig: Partial<ConfigInput> = {};

    if (env.FOSSA_API_KEY) {
      envConfig.apiKey = env.FOSSA_API_KEY;
    }
    if (env.FOSSA_ENDPOINT) {
      envConfig.endpoint = env.FOSSA_ENDPOINT;
    }
    if (env.FOSSA_TIMEOUT_MS) {
      envConfig.timeoutMs = Number(env.FOSSA_TIMEOUT_MS);
    }
    if (env.FOSSA_CLI_PATH) {
      envConfig.cliPath = env.FOSSA_CLI_PATH;
    }
    if (env.LOG_LEVEL) {
      const level = env.LOG_LEVEL.toLowerCase();
      if (level === 'error' || level === 'warn' || level === 'info' || level === 'debug') {
        envConfig.logLevel = level;
      }
    }

    return envConfig;
  }

  private merge(base: Partial<ConfigInput>, override: Partial<ConfigInput>): Partial<ConfigInput> {
    return {
      endpoint: override.endpoint ?? base.endpoint,
      apiKey: override.apiKey ?? base.apiKey,
      timeoutMs: override.timeoutMs ?? base.timeoutMs,
      cliPath: override.cliPath ?? base.cliPath,
      mode: override.mode ?? base.mode,
      debug: override.debug ?? base.debug,
      logLevel: override.logLevel ?? base.logLevel,
      logDir: override.logDir ?? base.logDir,
    };
  }
}
