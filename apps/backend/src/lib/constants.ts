import type { DeviceLinkDirection, DeviceLinkType, InstallJobStatus, InstallType, RuntimeMode } from '@homehub/types';

export const RUNTIME_MODES: readonly RuntimeMode[] = ['in-process', 'microservice', 'hybrid', 'embedded'];
export const INSTALL_TYPES: readonly InstallType[] = ['url', 'source-control', 'local'];
export const LINK_TYPES: readonly DeviceLinkType[] = ['bridge', 'proxy', 'sync', 'mirror'];
export const LINK_DIRECTIONS: readonly DeviceLinkDirection[] = ['bidirectional', 'unidirectional'];

/** Rank of each job status; terminal statuses share the highest rank */
export const JOB_STATUS_RANK: Readonly<Record<InstallJobStatus, number>> = {
    pending: 0,
    sent: 1,
    running: 2,
    success: 3,
    failed: 3
};

export const MAX_DEVICE_LINK_DEPTH = 5;

export const PLUGIN_INSTALL_TIMEOUT_MS = 300_000;
export const PLUGIN_LOAD_TIMEOUT_MS = 60_000;
export const PLUGIN_STOP_GRACE_MS = 5_000;

export const HEALTH_CHECK_INTERVAL_MS = 30_000;
export const HEALTH_CHECK_TIMEOUT_MS = 5_000;
export const HEALTH_FAILURE_THRESHOLD = 3;

export const EVENT_BUS_DEBOUNCE_MS = 100;
export const EVENT_BUS_BATCH_SIZE = 10;
export const EVENT_BUS_MAX_LOG_SIZE = 1000;
export const EVENT_BUS_QUEUE_CAPACITY = 1000;

export const CACHE_PLUGINS_TTL = 60;
export const CACHE_DEVICES_TTL = 30;

export const INSTALL_QUEUE_CAPACITY = 100;
export const INSTALL_WORKER_CONCURRENCY = 2;

export const RPC_TIMEOUT_MS = 30_000;
export const RPC_CONNECT_TIMEOUT_MS = 10_000;
export const RPC_MAX_RETRIES = 3;
export const RPC_RETRY_DELAY_MS = 1_000;

/** Embedded sandbox limits */
export const SANDBOX_MAX_SUBSCRIPTIONS = 32;
export const SANDBOX_MAX_EMITS_PER_SECOND = 50;
export const SANDBOX_CALL_TIMEOUT_MS = 5_000;

export const EVENT_TOPICS = {
    pluginLoaded: 'plugin.loaded',
    pluginUnloaded: 'plugin.unloaded',
    pluginLoadFailed: 'plugin.load.failed',
    pluginHealthFailed: 'plugin.health.failed',
    pluginModeSwitched: 'plugin.mode.switched',
    installJobFinished: 'plugin.install.finished'
} as const;

export function isRuntimeMode(value: unknown): value is RuntimeMode {
    return typeof value === 'string' && (RUNTIME_MODES as readonly string[]).includes(value);
}

export function isLinkType(value: unknown): value is DeviceLinkType {
    return typeof value === 'string' && (LINK_TYPES as readonly string[]).includes(value);
}

export function isLinkDirection(value: unknown): value is DeviceLinkDirection {
    return typeof value === 'string' && (LINK_DIRECTIONS as readonly string[]).includes(value);
}
