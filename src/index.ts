export * from './types/graph.js';
export * from './types/explorer.js';
export * from './errors.js';
export {
  loadConfig, DEFAULT_NODE_SIZES, DEFAULT_PALETTE,
  type EngineConfig, type RemovedTimePolicy, type StorageBackend
} from './config.js';
export { GraphStore, type GraphStoreOptions, type NodesRemovedListener } from './graph/graph-store.js';
export { TimeTracker, type Clock, type TimeTrackerOptions, type TrackerState } from './graph/time-tracker.js';
export {
  ExpansionScheduler, ExpansionState,
  type AutoExpandOptions, type AutoExpandReport, type ExpansionMode, type ExpansionSchedulerOptions
} from './graph/expansion.js';
export {
  AttributeMapSchema, DEFAULT_HISTORY_LIMIT, topicMatches,
  type EdgeMap, type NodeMap, type TreeStorage
} from './persistence/storage.js';
export { InMemoryTreeStorage } from './persistence/memory-storage.js';
export { JsonFileTreeStorage } from './persistence/json-file-storage.js';
export { SqliteTreeStorage } from './persistence/sqlite-storage.js';
export {
  PersistenceAdapter, fromDocument, toDocument,
  type PersistenceAdapterOptions, type SaveOutcome, type TreeDraft
} from './persistence/tree-document.js';
export { SessionRecorder, type SessionRecorderOptions } from './session/session-recorder.js';
export {
  ExplorationSession,
  type AutoExpandOutcome, type ExpansionOutcome, type ExplorationSessionOptions,
  type PersistResult, type SessionSettings, type SessionSnapshot
} from './session/exploration-session.js';
export { AnthropicExplorer, extractJson } from './explorers/anthropic-explorer.js';
export { ScriptedExplorer, type ExplorerCall, type ExplorerScript } from './explorers/scripted-explorer.js';
export { renderTree, formatSeconds } from './cli/render.js';
export { createLogger, setEventLogPath, getEventLogPath, setQuiet, type Logger } from './utils/logger.js';
export { TimeoutError, withTimeout } from './utils/timeout.js';
export { edgeDocumentKey, splitEdgeDocumentKey, generateNodeId } from './utils/ids.js';
