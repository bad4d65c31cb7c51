/**
 * Markup reading
 * @module splunk-client/xml
 */

export { MarkupTokenizer, type MarkupNode, type MarkupNodeKind } from './tokenizer.js';
export { MarkupReader } from './reader.js';
export {
  attributeOf,
  childOf,
  createXmlParser,
  isXmlNode,
  normalizeArray,
  parseXml,
  textOf,
  type XmlNode,
} from './parser.js';
export { parseResponseDocument, type ResponseDocument } from './response.js';
