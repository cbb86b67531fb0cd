import type { QueueDescriptor } from "../core/scaling/scaling.types";

export type RequestOptions = {
  signal?: AbortSignal;
};

export interface QueueMetadataSource {
  listQueues(options?: RequestOptions): Promise<QueueDescriptor[]>;
}
