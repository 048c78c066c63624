export { SessionStore, type CreateSessionOptions } from './store.js';
