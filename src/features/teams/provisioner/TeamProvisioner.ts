/**
 * Team provisioning: make sure a named team exists before it is referenced.
 *
 * The existence check and the create are two separate requests, so two runs
 * provisioning the same name at the same time can both create it. Whether the
 * server rejects the second create is up to the server.
 */

import type { IFossaAPIClient } from '../api/IFossaAPIClient.js';
import type { TeamId } from '../api/types.js';
import { ApiError, ConfigurationError } from '../../../shared/utils/errors.js';
import type { Logger } from '../../../shared/utils/logger.js';

export interface ProvisionResult {
  name: string;
  created: boolean;
  /**
   * Set only when this run created the team and the server returned an id
   */
  id: TeamId | null;
}

export class TeamProvisioner {
  constructor(
    private readonly client: IFossaAPIClient,
    private readonly logger: Logger
  ) {}

  /**
   * Exact, case-sensitive name match against the full team list.
   */
  async teamExists(name: string): Promise<boolean> {
    this.assertName(name);
    this.logger.info(`Checking if team '${name}' exists...`);

    const teams = await this.describeFailure('Failed to fetch teams', () => this.client.teams.list());
    const exists = teams.some((team) => team.name === name);

    if (exists) {
      this.logger.info(`Team '${name}' already exists`);
    } else {
      this.logger.warn(`Team '${name}' does not exist`);
    }
    return exists;
  }

  /**
   * Issue a single create request. Does not re-check existence.
   */
  async createTeam(name: string): Promise<TeamId | null> {
    this.assertName(name);
    this.logger.info(`Creating team '${name}'...`);

    const created = await this.describeFailure('Failed to create team', () =>
      this.client.teams.create({ name, autoAddUsers: false })
    );

    if (created.id === null) {
      this.logger.warn(`Team '${name}' created, but the response carried no team id`);
      this.logger.debug(`Response: ${JSON.stringify(created.body)}`);
    } else {
      this.logger.info(`Team '${name}' created successfully (ID: ${created.id})`);
    }
    return created.id;
  }

  async provision(name: string): Promise<ProvisionResult> {
    if (await this.teamExists(name)) {
      return { name, created: false, id: null };
    }
    const id = await this.createTeam(name);
    return { name, created: true, id };
  }

  private assertName(name: string): void {
    if (name.trim().length === 0) {
      throw new ConfigurationError('Team name is required');
    }
  }

  /**
   * Restate a rejected request in provisioning terms, keeping status and body.
   */
  private async describeFailure<T>(context: string, request: () => Promise<T>): Promise<T> {
    try {
      return await request();
    } catch (error) {
      if (error instanceof ApiError) {
        this.logger.debug(`Response: ${JSON.stringify(error.body)}`);
        const { statusCode } = error;
        // Accepted status: the body was malformed
        if (statusCode !== undefined && statusCode >= 200 && statusCode < 300) {
          throw new ApiError(`${context}: ${error.message}`, statusCode, error.body);
        }
        const status = statusCode !== undefined ? ` (HTTP ${statusCode})` : '';
        throw new ApiError(`${context}${status}`, statusCode, error.body);
      }
      throw error;
    }
  }
}
