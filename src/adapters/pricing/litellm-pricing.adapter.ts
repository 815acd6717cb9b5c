// =============================================================================
// LiteLLMPricingAdapter — Per-token prices from the LiteLLM model catalog
// =============================================================================

import { z } from "zod";

import type { ModelPriceInfo, PricingLookupPort } from "../../ports/pricing.port.js";
import { PricingLookupError } from "../../errors.js";

export const LITELLM_CATALOG_URL =
  "https://raw.githubusercontent.com/BerriAI/litellm/main/model_prices_and_context_window.json";

export interface LiteLLMPricingOptions {
  /** Catalog URL override */
  catalogUrl?: string;
  /** Request timeout in ms (default: 10000) */
  timeoutMs?: number;
  fetchImpl?: typeof fetch;
}

const CatalogEntrySchema = z.object({
  input_cost_per_token: z.number().optional(),
  output_cost_per_token: z.number().optional(),
});

type CatalogEntry = z.infer<typeof CatalogEntrySchema>;

// Entries that don't describe a priced model (e.g. "sample_spec") are dropped.
const CatalogSchema = z.record(z.unknown()).transform((raw) => {
  const entries = new Map<string, CatalogEntry>();
  for (const [name, value] of Object.entries(raw)) {
    const parsed = CatalogEntrySchema.safeParse(value);
    if (parsed.success) entries.set(name, parsed.data);
  }
  return entries;
});

export class LiteLLMPricingAdapter implements PricingLookupPort {
  private readonly catalogUrl: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;
  private catalog: Promise<Map<string, CatalogEntry>> | null = null;

  constructor(options: LiteLLMPricingOptions = {}) {
    this.catalogUrl = options.catalogUrl ?? LITELLM_CATALOG_URL;
    this.timeoutMs = options.timeoutMs ?? 10_000;
    this.fetchImpl = options.fetchImpl ?? globalThis.fetch;
  }

  async getModelInfo(model: string, provider?: string): Promise<ModelPriceInfo | null> {
    const catalog = await this.loadCatalog(model);

    const candidates = provider ? [model, `${provider}/${model}`] : [model];
    for (const name of candidates) {
      const entry = catalog.get(name);
      if (!entry) continue;
      return {
        inputCostPerToken: entry.input_cost_per_token ?? 0,
        outputCostPerToken: entry.output_cost_per_token ?? 0,
      };
    }
    return null;
  }

  /** Fetched once; a failed fetch is retried on the next lookup. */
  private loadCatalog(model: string): Promise<Map<string, CatalogEntry>> {
    if (!this.catalog) {
      this.catalog = this.fetchCatalog(model).catch((error: unknown) => {
        this.catalog = null;
        throw error;
      });
    }
    return this.catalog;
  }

  private async fetchCatalog(model: string): Promise<Map<string, CatalogEntry>> {
    let response: Response;
    try {
      response = await this.fetchImpl(this.catalogUrl, {
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      throw new PricingLookupError(model, error instanceof Error ? error.message : String(error));
    }

    if (!response.ok) {
      throw new PricingLookupError(model, `catalog request returned HTTP ${response.status}`);
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch {
      throw new PricingLookupError(model, "catalog is not valid JSON");
    }

    const parsed = CatalogSchema.safeParse(body);
    if (!parsed.success) {
      throw new PricingLookupError(model, "catalog is not a JSON object");
    }
    return parsed.data;
  }
}
