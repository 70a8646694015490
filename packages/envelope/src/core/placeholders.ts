/** Shown instead of the exception type and request details outside debug mode. */
export const HIDDEN_PLACEHOLDER = "Hidden"

/** Shown instead of the stack trace outside debug mode. */
export const ACCESS_DENIED_MESSAGE = "Access Denied: Set debug mode to true to see details."
