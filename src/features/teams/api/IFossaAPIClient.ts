/**
 * FOSSA API client interface.
 *
 * The subset of the FOSSA REST API used by the provisioner and the
 * ignore-rules exporter.
 */

import type {
  CreateTeamRequest,
  CreatedTeam,
  IgnoreRulePage,
  IgnoreRulePageRequest,
  Team,
} from './types.js';

export interface IFossaAPIClient {
  teams: {
    /**
     * GET /api/teams (200 only)
     */
    list(): Promise<Team[]>;

    /**
     * POST /api/teams (200 or 201)
     */
    create(request: CreateTeamRequest): Promise<CreatedTeam>;
  };

  ignoreRules: {
    /**
     * GET /api/v2/issues/exceptions, one page
     */
    listPage(request: IgnoreRulePageRequest): Promise<IgnoreRulePage>;
  };
}
