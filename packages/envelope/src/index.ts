export {
  DebugSwitch,
  type DebugSwitchDeps,
  type DebugSwitchOptions,
  defaultDebugSwitch,
  isDebugMode,
  setDebugMode,
} from "./adapters/policy/debug-switch"
export { fixedPolicy, revealAll, revealNone } from "./adapters/policy/fixed-policy"
export {
  createSanitizer,
  DEFAULT_MASK,
  DEFAULT_SENSITIVE_KEYS,
  defaultSanitizer,
  PatternSanitizer,
  type PatternSanitizerOptions,
  sanitizeRequestDetails,
} from "./adapters/sanitizer/pattern-sanitizer"
export {
  type ConfigureEnvelopesDeps,
  type ConfiguredEnvelopes,
  configureEnvelopes,
} from "./config/configure"
export {
  ENV_PREFIX,
  type EnvelopeSettings,
  envelopeSettingsSchema,
  type LoadEnvelopeSettingsOptions,
  loadEnvelopeSettings,
} from "./config/settings"
export { error, failure, paginated, success } from "./core/defaults"
export {
  createEnvelopeFactory,
  type EnvelopeFactory,
  type EnvelopeFactoryDeps,
} from "./core/envelope-factory"
export { ErrorDetail, type ErrorDetailDeps, type ErrorDetailInit } from "./core/error-detail"
export { isError, isFailure, isSuccess } from "./core/guards"
export { ACCESS_DENIED_MESSAGE, HIDDEN_PLACEHOLDER } from "./core/placeholders"
export { API_VERSION } from "./core/version"
export type {
  ErrorEnvelope,
  FailureEnvelope,
  ResponseEnvelope,
  SuccessEnvelope,
} from "./ports/envelope"
export type { ErrorDetailView, GatedErrorDetail } from "./ports/error-detail"
export type { Metadata, PaginationInfo } from "./ports/metadata"
export type { RevealPolicy } from "./ports/reveal-policy"
export type { Sanitizer } from "./ports/sanitizer"
export { StatusCode } from "./ports/status-code"
