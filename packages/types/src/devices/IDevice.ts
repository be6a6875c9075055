/**
 * Device tracked by the hub.
 *
 * Ownership is never stored on the device. It is resolved from plugin binding
 * selectors at lookup time.
 */
export interface IDevice {
    id: string;
    name: string;
    type: string;
    room: string | null;
    /** Free-form string attributes matched by binding selectors */
    attributes: Record<string, string>;
    isOnline: boolean;
    isOn: boolean;
    /** Free-form state payload reported by the controlling plugin */
    state: Record<string, unknown>;
    lastSeen: Date | null;
    updatedAt: Date;
}

/**
 * Input accepted by `upsertDevice()`.
 */
export interface IDeviceInput {
    id: string;
    name?: string;
    type?: string;
    room?: string | null;
    attributes?: Record<string, string>;
}

/**
 * Partial state report from a device's controlling plugin.
 */
export interface IDeviceStateReport {
    isOnline?: boolean;
    isOn?: boolean;
    state?: Record<string, unknown>;
}
