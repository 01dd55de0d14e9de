/**
 * Diagnostics sink passed into the organizer. Same call shape as the
 * trigger.dev SDK `logger`, so the task can hand that in directly.
 */
export interface Logger {
  debug(message: string, properties?: Record<string, unknown>): void;
  info(message: string, properties?: Record<string, unknown>): void;
  warn(message: string, properties?: Record<string, unknown>): void;
  error(message: string, properties?: Record<string, unknown>): void;
}
