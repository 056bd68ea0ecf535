export { MediaRegistry } from './media_registry';
export type { IMediaRegistry, MediaRegistryDependencies } from './media_registry.types';
