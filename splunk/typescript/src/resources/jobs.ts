/**
 * Search jobs: `search/jobs`
 * @module splunk-client/resources/jobs
 */

import { Argument } from '../args/index.js';
import type { Context } from '../client/context.js';
import { ResourceName } from '../client/namespace.js';
import { EnumConverter } from '../converters/index.js';
import { FormatError } from '../errors/index.js';
import { SearchResultStream } from '../search/index.js';
import { MarkupReader } from '../xml/index.js';
import { CollectionArgs, JobArgs, SearchEventArgs, SearchResultArgs } from './args.js';
import { Entity, type EntityList } from './entity.js';

export enum DispatchState {
  Queued = 'QUEUED',
  Parsing = 'PARSING',
  Running = 'RUNNING',
  Paused = 'PAUSED',
  Finalizing = 'FINALIZING',
  Failed = 'FAILED',
  Done = 'DONE',
}

const dispatchStateConverter = EnumConverter.create('DispatchState', DispatchState);

export class Job extends Entity {
  get sid(): string {
    return this.string('Sid') ?? this.name;
  }

  get dispatchState(): DispatchState | undefined {
    return this.value(dispatchStateConverter, 'DispatchState');
  }

  get isDone(): boolean {
    return this.boolean('IsDone') ?? false;
  }

  get isFailed(): boolean {
    return this.boolean('IsFailed') ?? false;
  }

  get isFinalized(): boolean {
    return this.boolean('IsFinalized') ?? false;
  }

  /**
   * Fraction complete, 0 to 1
   */
  get doneProgress(): number {
    return this.float('DoneProgress') ?? 0;
  }

  get eventCount(): number {
    return this.int32('EventCount') ?? 0;
  }

  get resultCount(): number {
    return this.int32('ResultCount') ?? 0;
  }

  get scanCount(): number {
    return this.int32('ScanCount') ?? 0;
  }

  /**
   * Seconds
   */
  get runDuration(): number {
    return this.float('RunDuration') ?? 0;
  }

  get earliestTime(): Date | undefined {
    return this.dateTime('EarliestTime');
  }

  get latestTime(): Date | undefined {
    return this.dateTime('LatestTime');
  }
}

export class JobsService {
  constructor(private readonly context: Context) {}

  async list(args: CollectionArgs = {}): Promise<EntityList<Job>> {
    const feed = await this.context.getFeed(ResourceName.searchJobs, {
      args: [CollectionArgs.enumerate(CollectionArgs.create(args))],
    });
    return { items: feed.entries.map((entry) => new Job(entry)), feed };
  }

  /**
   * Starts a search
   *
   * @returns the search ID
   * @throws SerializationError when `search` is missing
   */
  async create(args: JobArgs): Promise<string> {
    const response = await this.context.sendForResponse('POST', ResourceName.searchJobs, {
      args: [JobArgs.enumerate(JobArgs.create(args))],
    });
    if (response.sid === undefined) {
      throw FormatError.malformedDocument('job creation response has no <sid>');
    }
    return response.sid;
  }

  async get(sid: string): Promise<Job> {
    return new Job(await this.context.getEntry(ResourceName.searchJobs.child(sid)));
  }

  /**
   * Results of a job; a preview while the job runs
   */
  async getResults(sid: string, args: SearchResultArgs = {}): Promise<SearchResultStream> {
    return this.openResults(
      ResourceName.searchJobs.child(sid, 'results'),
      SearchResultArgs.enumerate(SearchResultArgs.create(args))
    );
  }

  async getEvents(sid: string, args: SearchEventArgs = {}): Promise<SearchResultStream> {
    return this.openResults(
      ResourceName.searchJobs.child(sid, 'events'),
      SearchEventArgs.enumerate(SearchEventArgs.create(args))
    );
  }

  async cancel(sid: string): Promise<void> {
    await this.context.send('POST', ResourceName.searchJobs.child(sid, 'control'), {
      args: [[new Argument('action', 'cancel')]],
    });
  }

  private async openResults(resource: ResourceName, args: readonly Argument[]): Promise<SearchResultStream> {
    const response = await this.context.sendStreaming('GET', resource, { args: [args] });
    return SearchResultStream.open(MarkupReader.fromStream(response.body));
  }
}
