export { FsSessionStore, createSessionManager } from './fs_session_store';
