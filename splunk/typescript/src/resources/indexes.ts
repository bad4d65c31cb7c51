/**
 * Indexes: `data/indexes`
 * @module splunk-client/resources/indexes
 */

import type { Context } from '../client/context.js';
import { ResourceName } from '../client/namespace.js';
import { CollectionArgs } from './args.js';
import { Entity, type EntityList } from './entity.js';

export class Index extends Entity {
  get totalEventCount(): bigint | undefined {
    return this.int64('TotalEventCount');
  }

  get currentDBSizeMB(): number | undefined {
    return this.int32('CurrentDBSizeMB');
  }

  get maxTotalDataSizeMB(): number | undefined {
    return this.int32('MaxTotalDataSizeMB');
  }

  get frozenTimePeriodInSecs(): number | undefined {
    return this.int32('FrozenTimePeriodInSecs');
  }

  get homePath(): string | undefined {
    return this.string('HomePath');
  }

  /**
   * `homePath.maxDataSizeMB` on the wire
   */
  get homePathMaxDataSizeMB(): number | undefined {
    return this.int32('HomePathMaxDataSizeMB');
  }

  /**
   * `coldPath.maxDataSizeMB` on the wire
   */
  get coldPathMaxDataSizeMB(): number | undefined {
    return this.int32('ColdPathMaxDataSizeMB');
  }

  get minTime(): Date | undefined {
    return this.dateTime('MinTime');
  }

  get maxTime(): Date | undefined {
    return this.dateTime('MaxTime');
  }
}

export class IndexesService {
  constructor(private readonly context: Context) {}

  async list(args: CollectionArgs = {}): Promise<EntityList<Index>> {
    const feed = await this.context.getFeed(ResourceName.dataIndexes, {
      args: [CollectionArgs.enumerate(CollectionArgs.create(args))],
    });
    return { items: feed.entries.map((entry) => new Index(entry)), feed };
  }

  async get(name: string): Promise<Index> {
    return new Index(await this.context.getEntry(ResourceName.dataIndexes.child(name)));
  }
}
