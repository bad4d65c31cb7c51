/**
 * `<response>` documents returned by login, dispatch and error replies
 * @module splunk-client/xml/response
 */

import type { ResponseMessage } from '../errors/index.js';
import { attributeOf, childOf, normalizeArray, parseXml, textOf } from './parser.js';

export interface ResponseDocument {
  readonly sessionKey?: string;
  readonly sid?: string;
  readonly messages: readonly ResponseMessage[];
}

/**
 * Reads a `<response>` body
 *
 * An empty body or a body with another root yields an empty document.
 *
 * @example
 * ```typescript
 * parseResponseDocument('<response><sid>1395.7</sid></response>').sid; // '1395.7'
 * ```
 */
export function parseResponseDocument(xml: string): ResponseDocument {
  if (xml.trim().length === 0) {
    return { messages: [] };
  }

  const response = childOf(parseXml(xml), 'response');
  const messages = normalizeArray(childOf(childOf(response, 'messages'), 'msg')).map(
    (msg): ResponseMessage => ({
      type: attributeOf(msg, 'type') ?? 'ERROR',
      text: textOf(msg) ?? '',
    })
  );

  return {
    sessionKey: textOf(childOf(response, 'sessionKey')),
    sid: textOf(childOf(response, 'sid')),
    messages,
  };
}
