export { ArchiveStore } from './archive_store';
