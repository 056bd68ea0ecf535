export {
  createMediaRecord,
  withMetadata,
  withOwner,
  createAccessEntry,
  loadMediaRecord,
  loadAccessEntry,
  loadSequenceState,
  loadHeightState,
} from "./media_record_factory";
export type { CreateMediaRecordPayload } from "./media_record_factory";
