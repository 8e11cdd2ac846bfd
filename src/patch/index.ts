export { ConnectionManager } from './connection-manager';
export type { ConnectionManagerOptions } from './connection-manager';
