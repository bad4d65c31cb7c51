/**
 * Bulletin-board messages: `messages`
 * @module splunk-client/resources/server-messages
 */

import { Argument } from '../args/index.js';
import { splitKeyPath } from '../atom/index.js';
import type { Context } from '../client/context.js';
import { ResourceName } from '../client/namespace.js';
import { EnumConverter } from '../converters/index.js';
import { CollectionArgs, ServerMessageArgs, ServerMessageSeverity } from './args.js';
import { Entity, type EntityList } from './entity.js';

const severityConverter = EnumConverter.create('ServerMessageSeverity', ServerMessageSeverity);

export class ServerMessage extends Entity {
  /**
   * Message text, stored under the message's own name
   */
  get text(): string | undefined {
    return this.string(...splitKeyPath(this.name));
  }

  get severity(): ServerMessageSeverity | undefined {
    return this.value(severityConverter, 'Severity');
  }

  get timeCreated(): Date | undefined {
    return this.dateTime('TimeCreatedEpochSecs');
  }
}

export class ServerMessagesService {
  constructor(private readonly context: Context) {}

  /**
   * @throws SerializationError when the severity or the text is missing
   */
  async create(name: string, args: ServerMessageArgs): Promise<ServerMessage> {
    const entry = await this.context.postForEntry(ResourceName.messages, name, {
      args: [[new Argument('name', name)], ServerMessageArgs.enumerate(ServerMessageArgs.create(args))],
    });
    return new ServerMessage(entry);
  }

  async list(args: CollectionArgs = {}): Promise<EntityList<ServerMessage>> {
    const feed = await this.context.getFeed(ResourceName.messages, {
      args: [CollectionArgs.enumerate(CollectionArgs.create(args))],
    });
    return { items: feed.entries.map((entry) => new ServerMessage(entry)), feed };
  }

  async get(name: string): Promise<ServerMessage> {
    return new ServerMessage(await this.context.getEntry(ResourceName.messages.child(name)));
  }

  async remove(name: string): Promise<void> {
    await this.context.send('DELETE', ResourceName.messages.child(name));
  }
}
