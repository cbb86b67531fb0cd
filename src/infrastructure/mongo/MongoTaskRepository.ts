import type { Collection, Document, MongoClient } from "mongodb";
import type { QueueBacklogCount } from "../../core/scaling/scaling.types";
import { BackendUnavailableError, MalformedResponseError } from "../../core/scaling/scaling.errors";
import { nonTerminalTaskStatuses, type TaskDoc } from "../../core/tasks/task.types";
import type { RequestOptions } from "../../ports/QueueMetadataSource";
import type { TaskBacklogSource, TaskSubmitter } from "../../ports/TaskRepository";
import { createMongoClient } from "./MongoClientFactory";
import { mongoIndexes } from "./mongo.indexes";

export const backlogPipeline = (): Document[] => [
  { $match: { status: { $in: [...nonTerminalTaskStatuses] }, queueName: { $type: "string" } } },
  { $group: { _id: "$queueName", count: { $sum: 1 } } }
];

/**
 * Turns `$group` rows into backlog counts, rejecting anything that is not `{ _id: string, count: int }`.
 */
export const toBacklogCounts = (rows: Document[]): QueueBacklogCount[] =>
  rows.map((row) => {
    const name: unknown = row._id;
    const count: unknown = row.count;
    if (typeof name !== "string" || name === "") {
      throw new MalformedResponseError("Backlog row has no queue name", { source: "task_backlog" });
    }
    if (typeof count !== "number" || !Number.isSafeInteger(count)) {
      throw new MalformedResponseError(`Backlog row for queue "${name}" has a non-integer count`, {
        source: "task_backlog",
        queueName: name
      });
    }
    return { name, count };
  });

const errorMessage = (err: unknown): string => (err instanceof Error ? err.message : String(err));

/**
 * Task store backed by the engine's Mongo `tasks` collection.
 */
export class MongoTaskRepository implements TaskBacklogSource, TaskSubmitter {
  private client?: MongoClient;
  private collection?: Collection<TaskDoc>;
  private connecting?: Promise<Collection<TaskDoc>>;
  private closed = false;

  constructor(
    private readonly mongoUri: string,
    private readonly timeoutMs = 5000,
    private readonly dbName = "scaler",
    private readonly collectionName = "tasks"
  ) {}

  private async getCollection(): Promise<Collection<TaskDoc>> {
    if (this.collection) return this.collection;
    if (this.closed) throw new Error("Task repository is closed");

    // Concurrent polls share one connection attempt; a failed attempt is not cached.
    this.connecting ??= this.connect().finally(() => {
      this.connecting = undefined;
    });
    return this.connecting;
  }

  private async connect(): Promise<Collection<TaskDoc>> {
    const client = createMongoClient(this.mongoUri, this.timeoutMs);
    try {
      await client.connect();
      // close() may have run while the connection was being set up
      if (this.closed) throw new Error("Task repository closed while connecting");
      const col = client.db(this.dbName).collection<TaskDoc>(this.collectionName);
      for (const idx of mongoIndexes.taskCollection) {
        await col.createIndex(idx.keys, idx.options);
      }
      this.client = client;
      this.collection = col;
      return col;
    } catch (err) {
      await client.close().catch(() => undefined);
      throw err;
    }
  }

  async countNonTerminalByQueue(options: RequestOptions = {}): Promise<QueueBacklogCount[]> {
    if (options.signal?.aborted) {
      throw new BackendUnavailableError("Task backlog query aborted", { source: "task_backlog" });
    }

    let rows: Document[];
    try {
      const col = await this.getCollection();
      rows = await col.aggregate(backlogPipeline(), { maxTimeMS: this.timeoutMs, signal: options.signal }).toArray();
    } catch (err) {
      // eslint-disable-next-line no-console
      console.warn(JSON.stringify({ event: "backend.request_failed", source: "task_backlog", status: null }));
      throw new BackendUnavailableError(`Task backlog query failed: ${errorMessage(err)}`, { source: "task_backlog" }, {
        cause: err
      });
    }

    return toBacklogCounts(rows);
  }

  async enqueue(doc: TaskDoc): Promise<void> {
    try {
      const col = await this.getCollection();
      await col.insertOne(doc);
    } catch (err) {
      throw new BackendUnavailableError(
        `Task submission failed: ${errorMessage(err)}`,
        { source: "task_submit", queueName: doc.queueName },
        { cause: err }
      );
    }
  }

  async close(): Promise<void> {
    this.closed = true;
    // An in-flight connect closes its own client once it sees `closed`; its rejection is the poll's to report.
    await this.connecting?.catch(() => undefined);
    await this.client?.close();
    this.client = undefined;
    this.collection = undefined;
  }
}
