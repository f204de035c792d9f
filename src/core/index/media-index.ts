/**
 * Media Index
 *
 * Owns the current snapshot and the single mutation queue. Mutations queued
 * in the same turn of the event loop are applied together as one batch and
 * published with one atomic snapshot swap. Readers grab `snapshot()` and
 * keep using it for the whole query regardless of later swaps.
 *
 * @module
 */

import type { IndexStatistics, MediaRecord, TextField } from "../../types/index.js";
import { Deferred, runDetached } from "../../utils/async.js";
import { createLogger, readJsonFile, writeJsonAtomic, type Logger } from "../../utils/index.js";
import { IndexCorruptionError, SchemaVersionError, wrapError, type SearchEngineError } from "../errors.js";
import { Analyzer } from "../query/analyzer.js";
import { SnapshotBuilder } from "./builder.js";
import { restoreSnapshot, serializeSnapshot } from "./persistence.js";
import { IndexSnapshot } from "./snapshot.js";
import type { IndexFile } from "../../utils/validation.js";

type Mutation = { type: "upsert"; record: MediaRecord } | { type: "remove"; id: string };

interface PendingMutation {
  mutation: Mutation;
  deferred: Deferred<boolean>;
}

export interface MediaIndexOptions {
  analyzer?: Analyzer;
  /** Most mutations applied per snapshot swap */
  maxBatchSize?: number;
  logger?: Logger;
}

interface BatchResult {
  version: number;
  applied: number;
  failed: number;
}

export class MediaIndex {
  readonly analyzer: Analyzer;
  private current: IndexSnapshot;
  private readonly queue: PendingMutation[] = [];
  private draining = false;
  private readonly maxBatchSize: number;
  private readonly logger: Logger;
  private loadError: SearchEngineError | null = null;

  constructor(options: MediaIndexOptions = {}, initial: IndexSnapshot = IndexSnapshot.empty()) {
    this.analyzer = options.analyzer ?? new Analyzer();
    this.maxBatchSize = options.maxBatchSize ?? 256;
    this.logger = options.logger ?? createLogger("index");
    this.current = initial;
  }

  // ==========================================================================
  // Reads
  // ==========================================================================

  /**
   * The current point-in-time view. Never changes once returned.
   */
  snapshot(): IndexSnapshot {
    return this.current;
  }

  getRecord(id: string): MediaRecord | undefined {
    return this.current.getRecord(id);
  }

  /**
   * Ids of records containing an already-normalized token
   */
  lookup(token: string, field?: TextField): Set<string> {
    return this.current.lookup(token, field);
  }

  get degraded(): boolean {
    return this.current.degraded;
  }

  /**
   * Why the last load fell back to an empty index, if it did
   */
  get lastLoadError(): SearchEngineError | null {
    return this.loadError;
  }

  get pendingMutations(): number {
    return this.queue.length;
  }

  statistics(): IndexStatistics {
    const snapshot = this.current;
    return {
      version: snapshot.version,
      recordCount: snapshot.size,
      vocabulary: {
        title: snapshot.vocabularySize("title"),
        description: snapshot.vocabularySize("description"),
        tags: snapshot.vocabularySize("tags"),
        keywords: snapshot.vocabularySize("keywords"),
        category: snapshot.vocabularySize("category"),
        mood: snapshot.vocabularySize("mood"),
      },
      degraded: snapshot.degraded,
    };
  }

  // ==========================================================================
  // Writes
  // ==========================================================================

  /**
   * Queues a full replace of the record. Resolves once the snapshot
   * containing it has been published.
   */
  async upsert(record: MediaRecord): Promise<void> {
    await this.enqueue({ type: "upsert", record });
  }

  /**
   * Queues removal of a record.
   *
   * @returns Whether the record existed when the removal was applied
   */
  remove(id: string): Promise<boolean> {
    return this.enqueue({ type: "remove", id });
  }

  /**
   * Resolves once every mutation queued so far has been applied
   */
  async flush(): Promise<void> {
    const last = this.queue[this.queue.length - 1];
    if (!last) return;
    await last.deferred.promise.then(
      () => undefined,
      () => undefined
    );
  }

  private enqueue(mutation: Mutation): Promise<boolean> {
    const deferred = new Deferred<boolean>();
    this.queue.push({ mutation, deferred });
    this.scheduleDrain();
    return deferred.promise;
  }

  private scheduleDrain(): void {
    if (this.draining) return;
    this.draining = true;
    runDetached(
      () => this.drainBatch(),
      (error) => {
        this.draining = false;
        this.logger.error({ err: error }, "Mutation batch failed");
      }
    );
  }

  /**
   * Applies up to maxBatchSize queued mutations and swaps the snapshot in
   */
  private drainBatch(): void {
    const batch = this.queue.splice(0, this.maxBatchSize);
    const builder = new SnapshotBuilder(this.current, this.analyzer);
    const outcomes: Array<{ pending: PendingMutation; result: boolean }> = [];
    let failed = 0;

    try {
      for (const pending of batch) {
        try {
          const { mutation } = pending;
          const result = mutation.type === "upsert" ? builder.upsert(mutation.record) : builder.remove(mutation.id);
          outcomes.push({ pending, result });
        } catch (error) {
          failed++;
          pending.deferred.reject(wrapError(error, "Index mutation failed"));
        }
      }

      this.current = builder.build();
    } catch (error) {
      const wrapped = wrapError(error, "Snapshot swap failed");
      for (const { pending } of outcomes) pending.deferred.reject(wrapped);
      this.logger.error({ err: wrapped, batchSize: batch.length }, "Snapshot swap failed");
      this.finishDrain();
      return;
    }

    for (const { pending, result } of outcomes) pending.deferred.resolve(result);

    const summary: BatchResult = { version: this.current.version, applied: outcomes.length, failed };
    this.logger.debug(summary, "Applied mutation batch");

    this.finishDrain();
  }

  private finishDrain(): void {
    this.draining = false;
    if (this.queue.length > 0) {
      this.scheduleDrain();
    }
  }

  // ==========================================================================
  // Persistence
  // ==========================================================================

  toJSON(): IndexFile {
    return serializeSnapshot(this.current);
  }

  /**
   * Writes the current snapshot. Pending mutations are flushed first.
   */
  async save(filePath: string): Promise<void> {
    await this.flush();
    const snapshot = this.current;
    await writeJsonAtomic(filePath, serializeSnapshot(snapshot));
    this.logger.info({ filePath, records: snapshot.size, version: snapshot.version }, "Index saved");
  }

  /**
   * Loads an index from disk. A missing file gives an empty index. A file
   * that fails its integrity check gives an empty index flagged degraded.
   *
   * @throws {SchemaVersionError} When the file needs migrating
   */
  static async load(filePath: string, options: MediaIndexOptions = {}): Promise<MediaIndex> {
    const logger = options.logger ?? createLogger("index");
    const analyzer = options.analyzer ?? new Analyzer();

    let data: unknown;
    try {
      data = await readJsonFile(filePath);
    } catch (error) {
      return MediaIndex.degraded(
        new IndexCorruptionError("Index snapshot could not be read", { cause: wrapError(error).message }),
        { ...options, analyzer, logger }
      );
    }

    if (data === null) {
      logger.info({ filePath }, "No index snapshot, starting empty");
      return new MediaIndex({ ...options, analyzer, logger });
    }

    try {
      const snapshot = restoreSnapshot(data, analyzer);
      logger.info({ filePath, records: snapshot.size }, "Index loaded");
      return new MediaIndex({ ...options, analyzer, logger }, snapshot);
    } catch (error) {
      if (error instanceof SchemaVersionError) {
        logger.error({ err: error, filePath }, "Index snapshot requires migration");
        throw error;
      }
      const corruption =
        error instanceof IndexCorruptionError
          ? error
          : new IndexCorruptionError("Index snapshot could not be restored", { cause: wrapError(error).message });
      return MediaIndex.degraded(corruption, { ...options, analyzer, logger });
    }
  }

  private static degraded(error: IndexCorruptionError, options: MediaIndexOptions): MediaIndex {
    options.logger?.error({ err: error }, "Index snapshot corrupt, falling back to an empty degraded index");
    const index = new MediaIndex(options, IndexSnapshot.empty(true));
    index.loadError = error;
    return index;
  }
}
