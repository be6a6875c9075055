export { EventBus, type IEventBusOptions } from './event-bus.js';
export { compileTopicPattern, assertValidTopic, type ITopicPattern } from './topic-pattern.js';
