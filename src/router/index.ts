export {
  IntentRouter,
  type RouterState,
  type RouterEnvironment,
  type RouterDependencies,
  type RouteRequest,
  type RouterOutcome,
  type AcceptOutcome,
  type DisambiguateOutcome,
} from './intent-router.js';
export {
  decideFastModel,
  decideEmbedding,
  isConfirmed,
  type FastModelDecision,
  type EmbeddingDecision,
} from './confidence-policy.js';
export {
  DisambiguationSessionStore,
  type Candidate,
  type DisambiguationSession,
  type NewSession,
} from './disambiguation-sessions.js';
export {
  SessionNotFoundError,
  InvalidSelectionError,
  ClassificationAbortedError,
  throwIfAborted,
} from './errors.js';
