/**
 * Splunk REST client
 *
 * Reads the management API's Atom feeds and search results as they stream
 * in, maps entry content to typed entities, and serializes request
 * parameters from declared holders.
 *
 * @module splunk-client
 * @example
 * ```typescript
 * import { createClient } from 'splunk-client';
 *
 * const client = createClient({ host: 'localhost', username: 'admin', password: 'changeme' });
 * await client.login();
 *
 * const sid = await client.jobs.create({ search: 'search index=_internal | head 10' });
 * const results = await client.jobs.getResults(sid);
 * for await (const result of results) {
 *   console.log(result.get('_raw'));
 * }
 *
 * await client.close();
 * ```
 */

// ============================================================================
// Client API
// ============================================================================

export {
  Context,
  createClient,
  createClientFromEnv,
  Namespace,
  ResourceName,
  SplunkClient,
  WILDCARD,
  type ClientOptions,
  type FeedOptions,
  type HttpMethod,
  type RequestOptions,
} from './client/index.js';

export * from './resources/index.js';
export * from './search/index.js';

// ============================================================================
// Configuration
// ============================================================================

export * from './config/index.js';

// ============================================================================
// Feeds, content values and converters
// ============================================================================

export * from './atom/index.js';
export * from './value/index.js';
export * from './converters/index.js';
export * from './xml/index.js';

// ============================================================================
// Arguments
// ============================================================================

export * from './args/index.js';

// ============================================================================
// Errors, logging and transport
// ============================================================================

export * from './errors/index.js';
export * from './observability/index.js';
export * from './transport/index.js';
