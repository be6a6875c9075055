export { DeviceLinkGraph, type IAddLinkOptions, type IDeviceLinkGraphOptions } from './device-link-graph.js';
