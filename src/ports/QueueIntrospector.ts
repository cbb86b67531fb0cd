import type { QueueState } from "../core/scaling/scaling.types";
import type { RequestOptions } from "./QueueMetadataSource";

export interface QueueIntrospector {
  fetchQueueState(options?: RequestOptions): Promise<QueueState>;
}
