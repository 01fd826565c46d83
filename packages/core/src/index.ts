export * from './audio/pcm.js';
export * from './audio/wav.js';
export type { AudioCaptureBackend } from './audio/AudioCaptureBackend.js';
export * from './keys/KeyRotationStore.js';
export * from './session/SessionOrchestrator.js';
export * from './storage/KeyValueStore.js';
export * from './storage/RecordingStore.js';
export * from './transcription/TranscriptionSession.js';
export type { SocketConnector, StreamingSocket, StreamingSocketHandlers } from './transcription/socket.js';
export * from './transcription/streamingTypes.js';
export * from './transcription/tokenClient.js';
export * from './utils/Signal.js';
export * from './utils/errors.js';
