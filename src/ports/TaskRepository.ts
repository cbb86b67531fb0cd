import type { QueueBacklogCount } from "../core/scaling/scaling.types";
import type { TaskDoc } from "../core/tasks/task.types";
import type { RequestOptions } from "./QueueMetadataSource";

export interface TaskBacklogSource {
  /**
   * One entry per queue that has at least one non-terminal task.
   */
  countNonTerminalByQueue(options?: RequestOptions): Promise<QueueBacklogCount[]>;
}

export interface TaskSubmitter {
  enqueue(doc: TaskDoc): Promise<void>;
}
