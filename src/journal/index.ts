export {
  EvidenceJournal,
  collect,
  type EvidenceJournalOptions,
  type JournalRecord,
  type JournalRecovery,
} from './journal.js';

export {
  ChainVerifier,
  verifyChainLines,
  type ChainVerifierOptions,
  type ChainVerification,
} from './verify.js';
