// =============================================================================
// spendguard — Public API
// =============================================================================

// Accounting core
export {
  UsageAccountant,
  DEFAULT_CALL_DURATION_SECONDS,
} from "./accounting/usage-accountant.js";
export type {
  UsageAccountantOptions,
  CallStartInfo,
  ResetOptions,
} from "./accounting/usage-accountant.js";
export {
  getDefaultAccountant,
  peekDefaultAccountant,
  clearDefaultAccountant,
  initializeAccounting,
} from "./accounting/default-accountant.js";
export type {
  DefaultAccountantOptions,
  InitializeAccountingOptions,
} from "./accounting/default-accountant.js";
export {
  extractUsage,
  normalizeUsage,
  DEFAULT_EXTRACTORS,
  PROMPT_SHARE_OF_TOTAL,
  llmOutputExtractor,
  usageAttributeExtractor,
  aiSdkExtractor,
  generationsExtractor,
} from "./accounting/usage-extractor.js";
export type { TokenUsage, ExtractionResult, UsageExtractor } from "./accounting/usage-extractor.js";
export { CostModel, ZERO_RULE } from "./accounting/cost-model.js";
export type {
  PricingRule,
  FlatPricingRule,
  TieredPricingRule,
  PricingSource,
  ResolvedPricing,
  TokenRates,
  CostModelOptions,
} from "./accounting/cost-model.js";
export { MODEL_COSTS } from "./accounting/model-costs.js";
export type { ModelCostEntry, FlatModelCost, TieredModelCost } from "./accounting/model-costs.js";
export { LimitGovernor, checkLimits, formatLimitMessage } from "./accounting/limit-governor.js";
export type { LimitSettings, LimitResolution } from "./accounting/limit-governor.js";
export { AsyncLock } from "./accounting/async-lock.js";

// Domain
export { Money, ZERO, money } from "./domain/money.js";
export type {
  UsageEvent,
  RunningTotals,
  SessionTotals,
  LimitType,
  LimitBreach,
  UserLimitDecision,
  UsageStats,
} from "./domain/usage.js";
export {
  AccountingSettingsSchema,
  DEFAULT_SETTINGS,
  SETTING_KEYS,
  readSettings,
} from "./domain/settings.schema.js";
export type { AccountingSettings, SettingKey } from "./domain/settings.schema.js";
export { TrajectoryRecordSchema } from "./domain/trajectory.schema.js";

// Ports
export type { ConfigStorePort } from "./ports/config-store.port.js";
export type { SessionStorePort, SessionRecord, SessionId } from "./ports/session-store.port.js";
export type {
  TrajectoryPort,
  TrajectoryRecord,
  TrajectoryRecordInput,
  TrajectoryFilter,
  ModelUsageInput,
  LimitReachedInput,
} from "./ports/trajectory.port.js";
export type { PricingLookupPort, ModelPriceInfo } from "./ports/pricing.port.js";
export type { ConfirmationPort } from "./ports/confirmation.port.js";
export type { LoggerPort, LogEntry, LogLevel } from "./ports/logging.port.js";

// Adapters
export { InMemoryConfigStore } from "./adapters/config/in-memory-config.adapter.js";
export { InMemorySessionStore } from "./adapters/session/in-memory-session.adapter.js";
export { InMemoryTrajectoryStore } from "./adapters/trajectory/in-memory-trajectory.adapter.js";
export { NdjsonTrajectoryAdapter } from "./adapters/trajectory/ndjson-trajectory.adapter.js";
export type { NdjsonTrajectoryOptions } from "./adapters/trajectory/ndjson-trajectory.adapter.js";
export { PostgresStore } from "./adapters/storage/postgres/postgres-store.adapter.js";
export type { PostgresStoreOptions, PgQueryable } from "./adapters/storage/postgres/postgres-store.adapter.js";
export { LiteLLMPricingAdapter } from "./adapters/pricing/litellm-pricing.adapter.js";
export type { LiteLLMPricingOptions } from "./adapters/pricing/litellm-pricing.adapter.js";
export { ReadlineConfirmationAdapter } from "./adapters/confirmation/readline-confirmation.adapter.js";
export { ConsoleLoggingAdapter } from "./adapters/logging/console-logging.adapter.js";
export type { ConsoleLoggingOptions } from "./adapters/logging/console-logging.adapter.js";

// AI SDK integration
export { createUsageAccountingMiddleware, tapFinishPart } from "./middleware/usage-accounting.js";

// Errors
export {
  SpendGuardError,
  ConfigValidationError,
  PricingLookupError,
  PersistenceError,
} from "./errors.js";
