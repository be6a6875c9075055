/**
 * Relationship kinds between two devices.
 */
export type DeviceLinkType = 'bridge' | 'proxy' | 'sync' | 'mirror';

/**
 * Whether a link may be traversed from `to` back to `from`.
 */
export type DeviceLinkDirection = 'bidirectional' | 'unidirectional';

/**
 * Edge of the device link graph.
 */
export interface IDeviceLink {
    fromDevice: string;
    toDevice: string;
    linkType: DeviceLinkType;
    direction: DeviceLinkDirection;
    /** Insertion order, used to break traversal ties */
    sequence: number;
    enabled: boolean;
    config: Record<string, unknown>;
    createdAt: Date;
}

/**
 * One device reached by `relatedDevices()`.
 */
export interface IRelatedDevice {
    deviceId: string;
    /** Number of hops from the start device, 1..5 */
    depth: number;
    /** Device ids from the start device to this one, both inclusive */
    path: string[];
    /** Link type of every hop along `path` */
    linkTypes: DeviceLinkType[];
}
