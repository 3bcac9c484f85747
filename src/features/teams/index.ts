/**
 * Teams feature - FOSSA team provisioning
 * Public API exports
 */

// Commands
export { createTeamCommand, runTeamCommand } from './commands/team.js';

// Workflow
export { TeamWorkflow, type TeamRunSummary } from './TeamWorkflow.js';
export { TeamProvisioner, type ProvisionResult } from './provisioner/index.js';

// API
export * from './api/index.js';
