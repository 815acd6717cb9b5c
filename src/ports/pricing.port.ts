// =============================================================================
// PricingLookupPort — Remote per-token price catalog
// =============================================================================

export interface ModelPriceInfo {
  inputCostPerToken: number;
  outputCostPerToken: number;
}

export interface PricingLookupPort {
  getModelInfo(model: string, provider?: string): Promise<ModelPriceInfo | null>;
}
