export const FEEDBACK_EVENTS = {
  // Recording
  RECORDING_STARTED: 'RecordingStarted',
  RECORDING_STOPPED: 'RecordingStopped',
  NO_SPEECH_DETECTED: 'NoSpeechDetected',

  // Remote calls
  TRANSCRIBING_STARTED: 'TranscribingStarted',
  POST_PROCESSING_STARTED: 'PostProcessingStarted',

  // Outcomes
  WARNING: 'Warning',
  ERROR: 'Error',
  CANCELLED: 'Cancelled',
  DONE: 'Done',
} as const;

export type FeedbackEventType = typeof FEEDBACK_EVENTS[keyof typeof FEEDBACK_EVENTS];

