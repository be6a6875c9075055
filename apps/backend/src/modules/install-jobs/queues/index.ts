export type { IInstallQueue, InstallJobProcessor } from './install-queue.js';
export { MemoryInstallQueue } from './memory-install-queue.js';
export { BullInstallQueue } from './bullmq-install-queue.js';
