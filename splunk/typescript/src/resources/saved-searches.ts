/**
 * Saved searches: `saved/searches`
 * @module splunk-client/resources/saved-searches
 */

import type { Context } from '../client/context.js';
import { ResourceName } from '../client/namespace.js';
import { FormatError } from '../errors/index.js';
import { CollectionArgs, SavedSearchDispatchArgs } from './args.js';
import { Entity, type EntityList } from './entity.js';

export class SavedSearch extends Entity {
  get search(): string | undefined {
    return this.string('Search');
  }

  get description(): string | undefined {
    return this.string('Description');
  }

  get cronSchedule(): string | undefined {
    return this.string('CronSchedule');
  }

  get isScheduled(): boolean {
    return this.boolean('IsScheduled') ?? false;
  }

  get isVisible(): boolean {
    return this.boolean('IsVisible') ?? true;
  }

  get dispatchEarliestTime(): string | undefined {
    return this.string('Dispatch', 'EarliestTime');
  }

  get dispatchLatestTime(): string | undefined {
    return this.string('Dispatch', 'LatestTime');
  }

  /**
   * `action.email` on the wire, read under `Action.Email.IsEnabled`
   */
  get emailActionEnabled(): boolean {
    return this.boolean('Action', 'Email', 'IsEnabled') ?? false;
  }

  get alertType(): string | undefined {
    return this.string('Alert', 'Type');
  }
}

export class SavedSearchesService {
  constructor(private readonly context: Context) {}

  async list(args: CollectionArgs = {}): Promise<EntityList<SavedSearch>> {
    const feed = await this.context.getFeed(ResourceName.savedSearches, {
      args: [CollectionArgs.enumerate(CollectionArgs.create(args))],
    });
    return { items: feed.entries.map((entry) => new SavedSearch(entry)), feed };
  }

  async get(name: string): Promise<SavedSearch> {
    return new SavedSearch(await this.context.getEntry(ResourceName.savedSearches.child(name)));
  }

  /**
   * Runs a saved search
   *
   * @returns the search ID of the new job
   */
  async dispatch(name: string, args: SavedSearchDispatchArgs = {}): Promise<string> {
    const response = await this.context.sendForResponse('POST', ResourceName.savedSearches.child(name, 'dispatch'), {
      args: [SavedSearchDispatchArgs.enumerate(SavedSearchDispatchArgs.create(args))],
    });
    if (response.sid === undefined) {
      throw FormatError.malformedDocument('dispatch response has no <sid>');
    }
    return response.sid;
  }
}
