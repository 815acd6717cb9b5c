// =============================================================================
// Default accountant — Process-wide UsageAccountant
// =============================================================================

import { SpendGuardError } from "../errors.js";
import { UsageAccountant, type UsageAccountantOptions } from "./usage-accountant.js";

let current: Promise<UsageAccountant> | null = null;
let resolved: UsageAccountant | null = null;

export interface DefaultAccountantOptions extends UsageAccountantOptions {
  /** Replace the existing accountant instead of returning it */
  reinitialize?: boolean;
}

/**
 * Returns the process-wide accountant, creating it on first use. Concurrent
 * first calls share one instance.
 */
export function getDefaultAccountant(options?: DefaultAccountantOptions): Promise<UsageAccountant> {
  if (current && !options?.reinitialize) return current;

  if (!options) {
    return Promise.reject(
      new SpendGuardError("ACCOUNTANT_NOT_INITIALIZED", "No default accountant; pass options to create one"),
    );
  }

  const { reinitialize: _reinitialize, ...accountantOptions } = options;
  const pending = UsageAccountant.create(accountantOptions).then((accountant) => {
    if (current === pending) resolved = accountant;
    return accountant;
  });
  current = pending;
  resolved = null;
  return pending;
}

/** The default accountant if one has finished initializing. */
export function peekDefaultAccountant(): UsageAccountant | null {
  return resolved;
}

export function clearDefaultAccountant(): void {
  current = null;
  resolved = null;
}

export interface InitializeAccountingOptions extends Omit<UsageAccountantOptions, "modelName" | "provider"> {
  /** Model whose id and provider seed pricing */
  model: { modelId: string; provider?: string };
  trackCost?: boolean;
}

/** "anthropic.messages" → "anthropic" */
export function providerName(provider: string | undefined): string | undefined {
  if (!provider) return undefined;
  return provider.split(".")[0] || undefined;
}

/**
 * Sets up the default accountant for a model. Returns null and leaves the
 * current default untouched when cost tracking is disabled.
 */
export async function initializeAccounting(options: InitializeAccountingOptions): Promise<UsageAccountant | null> {
  const { model, trackCost = true, ...rest } = options;
  if (!trackCost) {
    rest.logger?.debug("accounting:disabled", { model: model.modelId });
    return null;
  }

  return getDefaultAccountant({
    ...rest,
    modelName: model.modelId,
    provider: providerName(model.provider),
    reinitialize: true,
  });
}
