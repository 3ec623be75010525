export { ok, err, type Result } from './types/result.js';
export {
  defineSchema,
  lookupFlag,
  optionMask,
  hasOption,
  type ArgumentSchema,
  type ArgumentType,
  type FlagSpec,
} from './args/schema.js';
export {
  validate,
  classifyToken,
  MAX_TOKEN_LENGTH,
  type ParsedCommand,
  type FlagValue,
  type TokenRef,
  type TokenClass,
  type ValueType,
  type ValidationError,
} from './args/validator.js';
export { describeValidationError, renderDiagnostic } from './args/diagnostic.js';
export { SessionGate, tryAdmit, type Session, type Admission } from './session/session-gate.js';
export { DaemonReadinessPoller, type DaemonReadinessPollerConfig, type Readiness } from './daemon/readiness-poller.js';
export { findLatest, instanceName, type ContainerRecord, type NotFound } from './container/locator.js';
export { provisionNext, createNextSlot, slotName, type VolumeSlot } from './container/volume-provisioner.js';
export type { ContainerRuntime, FreshInstanceSpec, LaunchResult, LaunchFailure, Launched } from './container/runtime.js';
export { DockerRuntime, type DockerRuntimeConfig } from './container/docker-runtime.js';
export {
  OrchestrationEngine,
  type OrchestrationEngineConfig,
  type EngineState,
  type ServerTarget,
  type StartInvocation,
  type StartOutcome,
} from './engine/orchestration-engine.js';
export { START_SCHEMA, describeSchema } from './engine/start-command.js';
export { formatCooldown, formatTimestamp, formatStatus, formatStartOutcome, rateLimitedReply } from './engine/replies.js';
export {
  loadConfig,
  loadSettings,
  parseSettings,
  versionTag,
  VERSION_RE,
  type AppConfig,
  type Settings,
} from './config/settings.js';
