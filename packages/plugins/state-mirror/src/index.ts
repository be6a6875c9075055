export { stateMirrorManifest } from './manifest.js';
export { createStateMirrorPlugin, STATE_TOPIC_PATTERN, SYNC_TOPIC } from './backend/backend.js';
