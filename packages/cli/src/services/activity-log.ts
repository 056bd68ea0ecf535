import type { EventBus, Logger } from '@medialedger/core';

/**
 * One-line description of a committed ledger operation
 */
export function describeEvent(event: EventBus.MediaLedgerEvent): string {
  switch (event.type) {
    case 'media.archived':
      return `media #${event.payload.recordId} archived by ${event.payload.owner} at height ${event.payload.createdAt}`;
    case 'media.metadata.modified':
      return `media #${event.payload.recordId} updated by ${event.payload.triggeredBy} at height ${event.payload.height}`;
    case 'media.ownership.transferred':
      return `media #${event.payload.recordId} transferred from ${event.payload.previousOwner} to ${event.payload.newOwner} at height ${event.payload.height}`;
    case 'media.removed':
      return `media #${event.payload.recordId} removed by ${event.payload.triggeredBy} at height ${event.payload.height}`;
    case 'access.granted':
      return `access to media #${event.payload.recordId} granted to ${event.payload.principal} by ${event.payload.triggeredBy}`;
    case 'access.revoked':
      return `access to media #${event.payload.recordId} revoked from ${event.payload.principal} by ${event.payload.triggeredBy}`;
  }
}

/**
 * Reports every committed operation on `events` at debug level, so it shows
 * under --verbose. Returns the unsubscribe function.
 */
export function attachActivityLog(events: EventBus.IEventStream, logger: Logger.Logger): () => void {
  return events.subscribe('*', (event) => {
    logger.debug(`committed: ${describeEvent(event)}`);
  });
}
