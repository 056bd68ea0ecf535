/**
 * Event Bus types for the media ledger
 */

import type { Height, MediaRecord, Principal, RecordId } from '../types';

/**
 * Base event structure
 */
export type BaseEvent = {
  /** Event type identifier */
  type: string;
  /** Event timestamp */
  timestamp: number;
  /** Event payload */
  payload: unknown;
  /** Source that emitted the event */
  source: string;
};

/**
 * Media record events
 */
export type MediaArchivedEvent = BaseEvent & {
  type: 'media.archived';
  payload: Pick<MediaRecord, 'recordId' | 'owner' | 'createdAt'>;
};

export type MediaMetadataModifiedEvent = BaseEvent & {
  type: 'media.metadata.modified';
  payload: {
    recordId: RecordId;
    triggeredBy: Principal; // Owner who amended the record
    height: Height;
  };
};

export type MediaOwnershipTransferredEvent = BaseEvent & {
  type: 'media.ownership.transferred';
  payload: {
    recordId: RecordId;
    previousOwner: Principal;
    newOwner: Principal;
    height: Height;
  };
};

export type MediaRemovedEvent = BaseEvent & {
  type: 'media.removed';
  payload: {
    recordId: RecordId;
    triggeredBy: Principal;
    height: Height;
  };
};

/**
 * Access matrix events
 */
export type AccessGrantedEvent = BaseEvent & {
  type: 'access.granted';
  payload: {
    recordId: RecordId;
    principal: Principal;
    triggeredBy: Principal;
  };
};

export type AccessRevokedEvent = BaseEvent & {
  type: 'access.revoked';
  payload: {
    recordId: RecordId;
    principal: Principal;
    triggeredBy: Principal;
  };
};

/**
 * Union type of all possible events
 */
export type MediaLedgerEvent =
  | MediaArchivedEvent
  | MediaMetadataModifiedEvent
  | MediaOwnershipTransferredEvent
  | MediaRemovedEvent
  | AccessGrantedEvent
  | AccessRevokedEvent;

export type MediaLedgerEventType = MediaLedgerEvent['type'];

/**
 * A single event type, or '*' for every event
 */
export type EventSelector = MediaLedgerEventType | '*';

export type EventOf<K extends EventSelector> = K extends MediaLedgerEventType
  ? Extract<MediaLedgerEvent, { type: K }>
  : MediaLedgerEvent;

export type EventHandler<T extends MediaLedgerEvent = MediaLedgerEvent> = (event: T) => void | Promise<void>;
