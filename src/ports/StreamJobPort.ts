import type { QueueItem, StreamJob } from '@/domain/players/types';
import type { AudioCodec } from '@/ports/PlayerTransportPort';

export type MultiClientJobRequest = {
  queueId: string;
  item: QueueItem;
  seekMs: number;
  fadeIn: boolean;
};

export type ItemUrlRequest = {
  item: QueueItem;
  codec: AudioCodec;
  seekMs?: number;
  fadeIn?: boolean;
};

export interface StreamJobPort {
  createMultiClientJob(request: MultiClientJobRequest): Promise<StreamJob>;
  /** Active shared stream session for a queue, if any. */
  getMultiClientJob(queueId: string): StreamJob | undefined;
  resolveJobUrl(job: StreamJob, playerId: string, codec: AudioCodec): string;
  resolveItemUrl(request: ItemUrlRequest): Promise<string>;
}
