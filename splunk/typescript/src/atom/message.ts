/**
 * Feed messages
 * @module splunk-client/atom/message
 */

import { EnumConverter } from '../converters/index.js';

export enum MessageType {
  Debug = 'DEBUG',
  Information = 'INFO',
  Warning = 'WARN',
  Error = 'ERROR',
  Fatal = 'FATAL',
}

export const messageTypeConverter = EnumConverter.create('MessageType', MessageType);

export interface Message {
  readonly type: MessageType;
  readonly text: string;
}
