/**
 * Machine-readable codes carried by every orchestrator error.
 */
export type HubErrorCode =
    | 'INTERNAL_ERROR'
    | 'NOT_FOUND'
    | 'VALIDATION_ERROR'
    | 'CONFLICTING_JOB'
    | 'QUEUE_FULL'
    | 'TIMEOUT'
    | 'CANCELLED'
    | 'INVALID_CONFIG'
    | 'DUPLICATE_NAME'
    | 'PLUGIN_BUSY'
    | 'UNSUPPORTED_MODE'
    | 'SWITCH_FAILED'
    | 'LOAD_FAILED'
    | 'INVALID_STATE'
    | 'DEPENDENCY_MISSING'
    | 'DEPENDENCY_CONFLICT'
    | 'DEPENDENCY_CYCLE'
    | 'CYCLE_REJECTED'
    | 'DUPLICATE_LINK'
    | 'SELF_LINK'
    | 'INVALID_LINK_TYPE'
    | 'INVALID_DIRECTION'
    | 'HANDLER_FAILURE'
    | 'RPC_ERROR'
    | 'SANDBOX_VIOLATION';

export class HubError extends Error {
    constructor(message: string, public readonly code: HubErrorCode = 'INTERNAL_ERROR', public readonly details?: unknown) {
        super(message);
        this.name = 'HubError';
    }
}

export class NotFoundError extends HubError {
    constructor(message = 'Resource not found', details?: unknown) {
        super(message, 'NOT_FOUND', details);
        this.name = 'NotFoundError';
    }
}

export class ValidationError extends HubError {
    constructor(message = 'Validation failed', details?: unknown) {
        super(message, 'VALIDATION_ERROR', details);
        this.name = 'ValidationError';
    }
}

export class ConflictingJobError extends HubError {
    constructor(pluginId: string, activeJobId: string) {
        super(`Plugin ${pluginId} already has an active install job`, 'CONFLICTING_JOB', { pluginId, activeJobId });
        this.name = 'ConflictingJobError';
    }
}

export class QueueFullError extends HubError {
    constructor(capacity: number) {
        super(`Install queue is full (${capacity})`, 'QUEUE_FULL', { capacity });
        this.name = 'QueueFullError';
    }
}

export class TimeoutError extends HubError {
    constructor(label: string, timeoutMs: number) {
        super(`${label} timed out after ${timeoutMs}ms`, 'TIMEOUT', { label, timeoutMs });
        this.name = 'TimeoutError';
    }
}

export class CancelledError extends HubError {
    constructor(label: string) {
        super(`${label} was cancelled`, 'CANCELLED', { label });
        this.name = 'CancelledError';
    }
}

export class InvalidConfigError extends HubError {
    constructor(pluginId: string, issues: string[]) {
        super(`Invalid config for plugin ${pluginId}: ${issues.join('; ')}`, 'INVALID_CONFIG', { pluginId, issues });
        this.name = 'InvalidConfigError';
    }
}

export class DuplicateNameError extends HubError {
    constructor(name: string) {
        super(`Plugin ${name} is already registered`, 'DUPLICATE_NAME', { name });
        this.name = 'DuplicateNameError';
    }
}

export class PluginBusyError extends HubError {
    constructor(pluginId: string, reason: string) {
        super(`Plugin ${pluginId} cannot be removed: ${reason}`, 'PLUGIN_BUSY', { pluginId });
        this.name = 'PluginBusyError';
    }
}

export class UnsupportedModeError extends HubError {
    constructor(pluginId: string, mode: string) {
        super(`Plugin ${pluginId} does not support mode ${mode}`, 'UNSUPPORTED_MODE', { pluginId, mode });
        this.name = 'UnsupportedModeError';
    }
}

export class SwitchFailedError extends HubError {
    constructor(pluginId: string, from: string, to: string, cause: unknown) {
        super(`Switching plugin ${pluginId} from ${from} to ${to} failed: ${describeError(cause)}`, 'SWITCH_FAILED', { pluginId, from, to });
        this.name = 'SwitchFailedError';
    }
}

export class LoadFailedError extends HubError {
    constructor(pluginId: string, mode: string, cause: unknown) {
        super(`Loading plugin ${pluginId} in ${mode} mode failed: ${describeError(cause)}`, 'LOAD_FAILED', {
            pluginId,
            mode,
            cause: cause instanceof HubError ? cause.code : undefined
        });
        this.name = 'LoadFailedError';
    }
}

export class InvalidStateError extends HubError {
    constructor(message: string, details?: unknown) {
        super(message, 'INVALID_STATE', details);
        this.name = 'InvalidStateError';
    }
}

export class DependencyError extends HubError {
    constructor(message: string, code: 'DEPENDENCY_MISSING' | 'DEPENDENCY_CONFLICT' | 'DEPENDENCY_CYCLE', details?: unknown) {
        super(message, code, details);
        this.name = 'DependencyError';
    }
}

export class CycleRejectedError extends HubError {
    constructor(from: string, to: string, cyclePath: string[]) {
        super(`Link ${from} -> ${to} would close a cycle: ${cyclePath.join(' -> ')}`, 'CYCLE_REJECTED', { from, to, cyclePath });
        this.name = 'CycleRejectedError';
    }
}

export class DuplicateLinkError extends HubError {
    constructor(from: string, to: string) {
        super(`Link ${from} -> ${to} already exists`, 'DUPLICATE_LINK', { from, to });
        this.name = 'DuplicateLinkError';
    }
}

export class SelfLinkError extends HubError {
    constructor(deviceId: string) {
        super(`Device ${deviceId} cannot link to itself`, 'SELF_LINK', { deviceId });
        this.name = 'SelfLinkError';
    }
}

export class InvalidLinkTypeError extends HubError {
    constructor(value: unknown) {
        super(`Invalid link type: ${String(value)}`, 'INVALID_LINK_TYPE', { value });
        this.name = 'InvalidLinkTypeError';
    }
}

export class InvalidDirectionError extends HubError {
    constructor(value: unknown) {
        super(`Invalid link direction: ${String(value)}`, 'INVALID_DIRECTION', { value });
        this.name = 'InvalidDirectionError';
    }
}

export class HandlerFailureError extends HubError {
    constructor(subscriptionId: string, topic: string, cause: unknown) {
        super(`Handler ${subscriptionId} failed for ${topic}: ${describeError(cause)}`, 'HANDLER_FAILURE', { subscriptionId, topic });
        this.name = 'HandlerFailureError';
    }
}

export class RpcError extends HubError {
    constructor(method: string, message: string, details?: unknown) {
        super(`RPC ${method} failed: ${message}`, 'RPC_ERROR', details);
        this.name = 'RpcError';
    }
}

export class SandboxViolationError extends HubError {
    constructor(pluginId: string, message: string) {
        super(`Plugin ${pluginId} sandbox violation: ${message}`, 'SANDBOX_VIOLATION', { pluginId });
        this.name = 'SandboxViolationError';
    }
}

export function describeError(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
