/**
 * FOSSA API Client Implementation
 *
 * HTTP client for the FOSSA REST API. Every request carries the caller's
 * bearer token unmodified; there is no refresh and no retry.
 */

import { APIClient } from '../../../shared/utils/apiClient.js';
import { ApiError } from '../../../shared/utils/errors.js';
import type { IFossaAPIClient } from './IFossaAPIClient.js';
import {
  type CreateTeamRequest,
  type CreatedTeam,
  type IgnoreRule,
  type IgnoreRulePage,
  type IgnoreRulePageRequest,
  type Team,
  CreatedTeamSchema,
  IgnoreRulePageSchema,
  IgnoreRuleSchema,
  TeamSchema,
} from './types.js';

export const TEAMS_PATH = '/api/teams';
export const IGNORE_RULES_PATH = '/api/v2/issues/exceptions';

/**
 * FOSSA API client configuration
 */
export interface FossaAPIClientConfig {
  /**
   * Base URL of the FOSSA instance, e.g. https://app.fossa.com
   */
  endpoint: string;

  /**
   * API key, sent as a bearer token
   */
  token: string;

  /**
   * Request timeout in milliseconds
   * @default 30000 (30 seconds)
   */
  timeout?: number;
}

export class FossaAPIClient implements IFossaAPIClient {
  private readonly http: APIClient;

  constructor(config: FossaAPIClientConfig) {
    this.http = new APIClient({
      baseURL: config.endpoint,
      token: config.token,
      timeout: config.timeout,
    });
  }

  /**
   * List teams
   *
   * GET /api/teams
   *
   * Entries without a string `name` are skipped; a body that is not an array
   * is rejected.
   */
  async listTeams(): Promise<Team[]> {
    const data = await this.http.get<unknown>(TEAMS_PATH, { expectStatus: [200] });

    if (!Array.isArray(data)) {
      throw new ApiError(`GET ${TEAMS_PATH} returned an unexpected body (expected an array)`, 200, data);
    }

    const teams: Team[] = [];
    for (const entry of data) {
      const parsed = TeamSchema.safeParse(entry);
      if (parsed.success) {
        teams.push(parsed.data);
      }
    }
    return teams;
  }

  /**
   * Create team
   *
   * POST /api/teams
   *
   * Both 200 and 201 count as success whatever the body looks like; the id is
   * null when the body has none.
   */
  async createTeam(request: CreateTeamRequest): Promise<CreatedTeam> {
    const data = await this.http.post<unknown>(
      TEAMS_PATH,
      { name: request.name, autoAddUsers: request.autoAddUsers },
      { expectStatus: [200, 201] }
    );

    const parsed = CreatedTeamSchema.safeParse(data);
    return {
      id: parsed.success ? parsed.data.id : null,
      body: data,
    };
  }

  /**
   * List one page of ignore rules
   *
   * GET /api/v2/issues/exceptions?filters[category]=<category>&page=<page>&count=<count>
   *
   * An unrecognised body shape reads as an empty page; entries that are not
   * objects are skipped.
   */
  async listIgnoreRules(request: IgnoreRulePageRequest): Promise<IgnoreRulePage> {
    const data = await this.http.get<unknown>(IGNORE_RULES_PATH, {
      expectStatus: [200],
      params: {
        'filters[category]': request.category,
        page: request.page,
        count: request.count,
      },
    });

    const parsed = IgnoreRulePageSchema.safeParse(data);
    if (!parsed.success) {
      return { rules: [], received: 0 };
    }

    const entries = Array.isArray(parsed.data) ? parsed.data : parsed.data.exceptions;
    const rules: IgnoreRule[] = [];
    for (const entry of entries) {
      const rule = IgnoreRuleSchema.safeParse(entry);
      if (rule.success) {
        rules.push(rule.data);
      }
    }
    return { rules, received: entries.length };
  }

  /**
   * IFossaAPIClient implementation
   */
  public teams = {
    list: async (): Promise<Team[]> => this.listTeams(),
    create: async (request: CreateTeamRequest): Promise<CreatedTeam> => this.createTeam(request),
  };

  public ignoreRules = {
    listPage: async (request: IgnoreRulePageRequest): Promise<IgnoreRulePage> =>
      this.listIgnoreRules(request),
  };
}
