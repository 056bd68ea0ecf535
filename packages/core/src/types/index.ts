export { MediaLedgerError } from './common.types';
export type { Principal, RecordId, Height, CallContext } from './common.types';
export type {
  MediaMetadata,
  MediaRecord,
  AccessEntry,
  SequenceState,
  HeightState,
} from './media.types';
