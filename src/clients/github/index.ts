/**
 * GitHub integration
 */

export { GitHubClient, decodeBase64Content, GITHUB_API_BASE, GITHUB_API_VERSION } from './client.js';
export type { GitHubClientOptions } from './client.js';
export type * from './types.js';
