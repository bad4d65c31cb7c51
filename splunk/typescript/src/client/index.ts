/**
 * Client, request context and namespaces
 * @module splunk-client/client
 */

export { SplunkClient } from './client.js';
export { Context, type FeedOptions, type HttpMethod, type RequestOptions } from './context.js';
export { createClient, createClientFromEnv, type ClientOptions } from './factory.js';
export { Namespace, ResourceName, WILDCARD } from './namespace.js';
