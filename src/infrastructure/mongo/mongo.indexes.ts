import type { IndexSpecification, CreateIndexesOptions } from "mongodb";

/**
 * Backlog counts filter on status and group by queue name.
 */
export const mongoIndexes: { taskCollection: Array<{ keys: IndexSpecification; options: CreateIndexesOptions }> } = {
  taskCollection: [
    { keys: { status: 1, queueName: 1 }, options: { name: "status_queueName" } }
  ]
};
