export * from './audio/WebAudioCapture.js';
export * from './audio/browserEnvironment.js';
export * from './audio/pcmWorklet.js';
export * from './config.js';
export * from './lib/api.js';
export * from './lib/browserSocket.js';
export * from './lib/LocalStorageStore.js';
export * from './lib/transcriber.js';
