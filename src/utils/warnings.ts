import type { EventBus } from "../events/event-bus.js";

export type WarningSink = {
  warn: (message: string, source?: string) => void;
};

export const formatWarning = (message: string, source?: string): string =>
  source ? `[${source}] ${message}` : message;

export const createConsoleWarningSink = (): WarningSink => ({
  warn: (message: string, source?: string) => {
    console.warn(formatWarning(message, source));
  }
});

export const createEventWarningSink = (bus: EventBus): WarningSink => ({
  warn: (message: string, source?: string) => {
    bus.emit({
      type: "warning.raised",
      payload: {
        message,
        source,
        recorded_at: new Date().toISOString()
      }
    });
  }
});

/** Keeps warnings in memory; used where the caller reports them itself. */
export const createCollectingWarningSink = (): WarningSink & { messages: string[] } => {
  const messages: string[] = [];
  return {
    messages,
    warn: (message: string, source?: string) => {
      messages.push(formatWarning(message, source));
    }
  };
};
