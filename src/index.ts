export { G3Client, G3ClientOptions, GAZE_SIGNAL, IMU_SIGNAL, EVENT_SIGNAL, SYNC_PORT_SIGNAL } from './g3';
export * from './lib/g3-interfaces';
export * from './lib/errors';
export { G3Connection, SignalSubscription } from './lib/g3-connection';
export { DeviceTransport, TransportFactory, openTransport, deviceUrl } from './lib/g3-utils';
export { SampleStream } from './lib/sample-stream';
export { SampleRouter, DisplaySink, RecorderSink, validateDecimation } from './lib/sample-router';
export { LiveDisplaySink, DisplayFrame, EventFrame, DisplayTransport, DISPLAY_EVENT } from './lib/live-display';
export { SessionRecorder, Session, RecordingSummary, createSession, fileStamp } from './lib/session-recorder';
export { GAZE_COLUMNS, IMU_COLUMNS } from './lib/csv-schema';
export { AcquisitionSession, SessionResult } from './lib/acquisition-session';
export { ControlService, ControlledDevice, StatusSnapshot, RecordingSaved } from './lib/control-service';
export { listRecordings, resolveRecording, RecordingEntry, RecordingMetadata } from './lib/recordings';
export { loadConfig, AppConfig } from './lib/config';
export { createServer, AppServer } from './server';
