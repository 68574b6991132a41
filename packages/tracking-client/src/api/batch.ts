import { InvalidArgumentError } from './errors';
import type { EventBatch, EventInfo, EventPayload } from './types';

// Structural only: payloads are not inspected, deduplicated or reordered.
export function encodeEventBatch<T extends EventPayload>(
  edgeMAC: string,
  eventInfos: readonly EventInfo<T>[],
): EventBatch<T> {
  if (edgeMAC == null) throw new InvalidArgumentError('edgeMAC');
  if (eventInfos == null) throw new InvalidArgumentError('eventInfos');

  return {
    edgeMAC,
    events: eventInfos.map(e => e.payload),
  };
}
