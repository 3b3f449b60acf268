export {
  ConfigModel,
  createConnection,
  connectionKey,
  formatConnectionPath,
  isHostPattern,
  sameConnectionFields,
  validateGroupPath,
} from './config-model.js';
export { MODELED_DIRECTIVES, DEFAULT_SSH_PORT } from './types.js';
export type {
  ConfigBlock,
  Connection,
  ConnectionInput,
  ConnectionEntry,
  Group,
  GroupPath,
  PatternBlock,
  ModeledDirective,
} from './types.js';
