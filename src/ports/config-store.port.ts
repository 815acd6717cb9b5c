// =============================================================================
// ConfigStorePort — Key/value settings read by the limit governor
// =============================================================================

/**
 * Untyped settings store. Values are validated where they are read, so a
 * malformed entry surfaces as a ConfigValidationError at the call site.
 */
export interface ConfigStorePort {
  get(key: string, defaultValue?: unknown): unknown;
}
