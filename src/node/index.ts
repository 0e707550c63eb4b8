export {
  NodeIdentityStore,
  NodeIdentitySchema,
  NODE_ID_PATTERN,
  generateIdentity,
  type NodeIdentity,
  type NodeIdentityStoreOptions,
} from './identity.js';

export {
  SequenceManager,
  SequenceStateSchema,
  type SequenceState,
  type SequenceManagerOptions,
  type RecoveryReport,
} from './sequence.js';
