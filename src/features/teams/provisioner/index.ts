export { TeamProvisioner, type ProvisionResult } from './TeamProvisioner.js';
