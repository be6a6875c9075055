import type { DeviceLinkDirection, DeviceLinkType, ILogger, IDeviceLink, IRelatedDevice } from '@homehub/types';
import type { IDeviceLinkRepository } from '../../database/repositories/interfaces.js';
import { MAX_DEVICE_LINK_DEPTH, isLinkDirection, isLinkType } from '../../lib/constants.js';
import { CycleRejectedError, DuplicateLinkError, InvalidDirectionError, InvalidLinkTypeError, SelfLinkError } from '../../lib/errors.js';
import { ReadWriteLock } from '../../lib/rw-lock.js';

interface GraphNode {
    deviceId: string;
    /** Edge ids traversable from this node, in insertion order */
    adjacent: number[];
}

interface GraphEdge {
    from: number;
    to: number;
    link: IDeviceLink;
}

export interface IAddLinkOptions {
    enabled?: boolean;
    config?: Record<string, unknown>;
}

export interface IDeviceLinkGraphOptions {
    maxDepth?: number;
}

/**
 * Depth-bounded relationship graph between devices.
 *
 * Nodes live in an arena indexed by position and edges refer to nodes by
 * index. An edge is accepted only if it closes no cycle of `maxDepth` hops or
 * fewer, and traversal stops at `maxDepth` with a visited set, so a walk
 * always terminates even over edges restored from storage unchecked.
 *
 * Mutations take the write side of a single-writer/multi-reader lock and
 * persist before touching memory. A failed write leaves the graph unchanged.
 */
export class DeviceLinkGraph {
    private readonly logger: ILogger;
    private readonly maxDepth: number;
    private readonly lock = new ReadWriteLock();
    private readonly nodes: GraphNode[] = [];
    private readonly nodeIndex = new Map<string, number>();
    private readonly edges: Array<GraphEdge | null> = [];
    private readonly pairIndex = new Map<string, number>();
    private sequence = 0;

    constructor(
        private readonly repository: IDeviceLinkRepository,
        logger: ILogger,
        options: IDeviceLinkGraphOptions = {}
    ) {
        this.logger = logger.child({ module: 'device-graph' });
        this.maxDepth = options.maxDepth ?? MAX_DEVICE_LINK_DEPTH;
    }

    /**
     * Restore links from the repository in insertion order.
     */
    async load(): Promise<number> {
        return this.lock.write(async () => {
            const links = await this.repository.findAll();
            links.sort((a, b) => a.sequence - b.sequence);
            let restored = 0;
            for (const link of links) {
                if (this.pairIndex.has(pairKey(link.fromDevice, link.toDevice))) {
                    this.logger.warn({ from: link.fromDevice, to: link.toDevice }, 'Skipping duplicate stored link');
                    continue;
                }
                this.commit(link);
                this.sequence = Math.max(this.sequence, link.sequence);
                restored += 1;
            }
            this.logger.info({ links: restored }, 'Device link graph loaded');
            return restored;
        });
    }

    async addLink(
        from: string,
        to: string,
        linkType: DeviceLinkType | string,
        direction: DeviceLinkDirection | string,
        options: IAddLinkOptions = {}
    ): Promise<IDeviceLink> {
        if (!isLinkType(linkType)) {
            throw new InvalidLinkTypeError(linkType);
        }
        if (!isLinkDirection(direction)) {
            throw new InvalidDirectionError(direction);
        }
        if (from === to) {
            throw new SelfLinkError(from);
        }

        return this.lock.write(async () => {
            if (this.pairIndex.has(pairKey(from, to))) {
                throw new DuplicateLinkError(from, to);
            }

            // The new edge closes a cycle iff the existing graph already leads back.
            const back = this.findPath(to, from, this.maxDepth - 1);
            if (back) {
                throw new CycleRejectedError(from, to, [from, to, ...back]);
            }
            if (direction === 'bidirectional') {
                const forward = this.findPath(from, to, this.maxDepth - 1);
                if (forward) {
                    throw new CycleRejectedError(from, to, [to, from, ...forward]);
                }
            }

            const link: IDeviceLink = {
                fromDevice: from,
                toDevice: to,
                linkType,
                direction,
                sequence: this.sequence + 1,
                enabled: options.enabled ?? true,
                config: { ...(options.config ?? {}) },
                createdAt: new Date()
            };

            await this.repository.insert(link);
            this.sequence = link.sequence;
            this.commit(link);
            this.logger.info({ from, to, linkType, direction }, 'Device link added');
            return copyLink(link);
        });
    }

    async removeLink(from: string, to: string): Promise<boolean> {
        return this.lock.write(async () => {
            const edgeId = this.pairIndex.get(pairKey(from, to));
            if (edgeId === undefined) {
                return false;
            }
            await this.repository.delete(from, to);
            this.detach(edgeId);
            this.logger.info({ from, to }, 'Device link removed');
            return true;
        });
    }

    /**
     * Remove a device together with every link touching it.
     *
     * @returns Number of links removed
     */
    async removeDevice(deviceId: string): Promise<number> {
        return this.lock.write(async () => {
            const index = this.nodeIndex.get(deviceId);
            if (index === undefined) {
                return 0;
            }
            await this.repository.deleteByDevice(deviceId);

            let removed = 0;
            this.edges.forEach((edge, edgeId) => {
                if (edge && (edge.from === index || edge.to === index)) {
                    this.detach(edgeId);
                    removed += 1;
                }
            });
            this.nodeIndex.delete(deviceId);
            return removed;
        });
    }

    /**
     * Devices reachable from `deviceId`, breadth-first.
     *
     * Unidirectional links are followed only from `from` to `to`. Neighbours
     * are visited in link insertion order, and traversal halts at `maxDepth`.
     * Disabled links are not followed.
     */
    async relatedDevices(deviceId: string): Promise<IRelatedDevice[]> {
        return this.lock.read(() => this.traverse(deviceId));
    }

    async listLinks(): Promise<IDeviceLink[]> {
        return this.lock.read(() =>
            this.edges
                .filter((edge): edge is GraphEdge => edge !== null)
                .map(edge => copyLink(edge.link))
                .sort((a, b) => a.sequence - b.sequence)
        );
    }

    getStats(): { devices: number; links: number } {
        return { devices: this.nodeIndex.size, links: this.pairIndex.size };
    }

    private traverse(deviceId: string): IRelatedDevice[] {
        const start = this.nodeIndex.get(deviceId);
        if (start === undefined) {
            return [];
        }

        const results: IRelatedDevice[] = [];
        const visited = new Set<number>([start]);
        const queue: Array<{ node: number; related: IRelatedDevice | null }> = [{ node: start, related: null }];

        for (let head = 0; head < queue.length; head += 1) {
            const { node, related } = queue[head];
            const depth = related?.depth ?? 0;
            if (depth >= this.maxDepth) {
                continue;
            }

            for (const edgeId of this.nodes[node].adjacent) {
                const edge = this.edges[edgeId];
                if (!edge || !edge.link.enabled) {
                    continue;
                }
                const next = edge.from === node ? edge.to : edge.from;
                if (visited.has(next)) {
                    continue;
                }
                visited.add(next);

                const entry: IRelatedDevice = {
                    deviceId: this.nodes[next].deviceId,
                    depth: depth + 1,
                    path: [...(related?.path ?? [deviceId]), this.nodes[next].deviceId],
                    linkTypes: [...(related?.linkTypes ?? []), edge.link.linkType]
                };
                results.push(entry);
                queue.push({ node: next, related: entry });
            }
        }

        return results;
    }

    /**
     * Shortest path of at most `maxHops` hops, as device ids after `start`.
     */
    private findPath(start: string, goal: string, maxHops: number): string[] | null {
        const startIndex = this.nodeIndex.get(start);
        const goalIndex = this.nodeIndex.get(goal);
        if (startIndex === undefined || goalIndex === undefined) {
            return null;
        }

        const parent = new Map<number, number>();
        const visited = new Set<number>([startIndex]);
        let frontier = [startIndex];

        for (let hop = 1; hop <= maxHops && frontier.length > 0; hop += 1) {
            const nextFrontier: number[] = [];
            for (const node of frontier) {
                for (const edgeId of this.nodes[node].adjacent) {
                    const edge = this.edges[edgeId];
                    if (!edge) {
                        continue;
                    }
                    const next = edge.from === node ? edge.to : edge.from;
                    if (visited.has(next)) {
                        continue;
                    }
                    visited.add(next);
                    parent.set(next, node);
                    if (next === goalIndex) {
                        return this.unwind(parent, startIndex, goalIndex);
                    }
                    nextFrontier.push(next);
                }
            }
            frontier = nextFrontier;
        }
        return null;
    }

    private unwind(parent: Map<number, number>, start: number, goal: number): string[] {
        const path: string[] = [];
        let current: number | undefined = goal;
        while (current !== undefined && current !== start) {
            path.unshift(this.nodes[current].deviceId);
            current = parent.get(current);
        }
        return path;
    }

    private ensureNode(deviceId: string): number {
        const existing = this.nodeIndex.get(deviceId);
        if (existing !== undefined) {
            return existing;
        }
        const index = this.nodes.length;
        this.nodes.push({ deviceId, adjacent: [] });
        this.nodeIndex.set(deviceId, index);
        return index;
    }

    private commit(link: IDeviceLink): void {
        const from = this.ensureNode(link.fromDevice);
        const to = this.ensureNode(link.toDevice);
        const edgeId = this.edges.length;
        this.edges.push({ from, to, link });
        this.pairIndex.set(pairKey(link.fromDevice, link.toDevice), edgeId);
        this.nodes[from].adjacent.push(edgeId);
        if (link.direction === 'bidirectional') {
            this.nodes[to].adjacent.push(edgeId);
        }
    }

    private detach(edgeId: number): void {
        const edge = this.edges[edgeId];
        if (!edge) {
            return;
        }
        for (const node of [edge.from, edge.to]) {
            const adjacency = this.nodes[node].adjacent;
            const position = adjacency.indexOf(edgeId);
            if (position !== -1) {
                adjacency.splice(position, 1);
            }
        }
        this.pairIndex.delete(pairKey(edge.link.fromDevice, edge.link.toDevice));
        this.edges[edgeId] = null;
    }
}

function pairKey(from: string, to: string): string {
    return `${from}\u0000${to}`;
}

function copyLink(link: IDeviceLink): IDeviceLink {
    return { ...link, config: { ...link.config } };
}
