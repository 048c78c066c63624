export {
  getCaseRecordingDir,
  getCasePayloadPath,
  ensureRecordingDir,
  recordTurnPayload,
  type RecordingFormat,
} from './recorder.js';

export {
  parseRecordedPayload,
  loadRecordedPayload,
} from './replayer.js';
