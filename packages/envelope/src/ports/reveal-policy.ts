/**
 * Decides whether captured error diagnostics may be shown.
 *
 * Consulted on every gated read, never cached, so a change is visible
 * immediately on envelopes that already exist.
 */
export interface RevealPolicy {
  isDebugMode(): boolean
}
