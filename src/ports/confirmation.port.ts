// =============================================================================
// ConfirmationPort — Blocking yes/no question to a human
// =============================================================================

export interface ConfirmationPort {
  confirm(message: string, defaultValue: boolean): Promise<boolean>;
}
