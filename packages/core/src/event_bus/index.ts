export { EventBus } from './event_bus';
export type { IEventStream } from './event_bus';
export type * from './types';
