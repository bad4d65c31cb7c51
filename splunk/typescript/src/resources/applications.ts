/**
 * Installed apps: `apps/local`
 * @module splunk-client/resources/applications
 */

import type { Context } from '../client/context.js';
import { Namespace, ResourceName } from '../client/namespace.js';
import { ApplicationCreationArgs, CollectionArgs } from './args.js';
import { Entity, type EntityList } from './entity.js';

export class Application extends Entity {
  get label(): string | undefined {
    return this.string('Label');
  }

  get version(): string | undefined {
    return this.string('Version');
  }

  get description(): string | undefined {
    return this.string('Description');
  }

  get applicationAuthor(): string | undefined {
    return this.string('Author');
  }

  get checkForUpdates(): boolean {
    return this.boolean('CheckForUpdates') ?? false;
  }

  get configured(): boolean {
    return this.boolean('Configured') ?? false;
  }

  get visible(): boolean {
    return this.boolean('Visible') ?? false;
  }

  get stateChangeRequiresRestart(): boolean {
    return this.boolean('StateChangeRequiresRestart') ?? false;
  }
}

export class ApplicationsService {
  constructor(private readonly context: Context) {}

  async list(args: CollectionArgs = {}): Promise<EntityList<Application>> {
    const feed = await this.context.getFeed(ResourceName.appsLocal, {
      namespace: Namespace.default,
      args: [CollectionArgs.enumerate(CollectionArgs.create(args))],
    });
    return { items: feed.entries.map((entry) => new Application(entry)), feed };
  }

  async get(name: string): Promise<Application> {
    const entry = await this.context.getEntry(ResourceName.appsLocal.child(name), { namespace: Namespace.default });
    return new Application(entry);
  }

  /**
   * @throws SerializationError when `name` is missing
   */
  async create(args: ApplicationCreationArgs): Promise<Application> {
    const values = ApplicationCreationArgs.create(args);
    const entry = await this.context.postForEntry(ResourceName.appsLocal, values.name ?? '', {
      namespace: Namespace.default,
      args: [ApplicationCreationArgs.enumerate(values)],
    });
    return new Application(entry);
  }

  async remove(name: string): Promise<void> {
    await this.context.send('DELETE', ResourceName.appsLocal.child(name), { namespace: Namespace.default });
  }
}
