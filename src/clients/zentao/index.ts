/**
 * ZenTao integration
 */

export { ZentaoClient, API_PREFIX, TOKEN_HEADER } from './client.js';
export type { ZentaoClientOptions } from './client.js';
export { parsePersonRef, personName } from './person.js';
export type { PersonRef } from './person.js';
export type * from './types.js';
