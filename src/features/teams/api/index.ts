/**
 * FOSSA API client exports
 */

export { FossaAPIClient, type FossaAPIClientConfig } from './FossaAPIClient.js';
export type { IFossaAPIClient } from './IFossaAPIClient.js';
export * from './types.js';
