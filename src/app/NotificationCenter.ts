import { logger } from '../utils/logger.js';

export type Severity = 'information' | 'warning' | 'error';

export interface Notification {
  id: number;
  message: string;
  severity: Severity;
}

type Listener = (current: Notification | null) => void;

export const DEFAULT_NOTIFY_TIMEOUT_MS = 3000;

/** Single-slot notification area; a message clears itself unless a newer one replaced it. */
export class NotificationCenter {
  private currentNote: Notification | null = null;
  private listeners = new Set<Listener>();
  private timers = new Set<NodeJS.Timeout>();
  private nextId = 1;

  constructor(private readonly defaultTimeoutMs = DEFAULT_NOTIFY_TIMEOUT_MS) {}

  get current() { return this.currentNote; }

  subscribe(fn: Listener) { this.listeners.add(fn); return () => { this.listeners.delete(fn); }; }

  notify(message: string, severity: Severity = 'information', timeoutMs = this.defaultTimeoutMs): Notification {
    const note = { id: this.nextId++, message, severity };
    this.currentNote = note;
    logger.debug({ severity, message }, 'notification');
    this.emit();
    const t = setTimeout(() => {
      this.timers.delete(t);
      if (this.currentNote?.id === note.id) {
        this.currentNote = null;
        this.emit();
      }
    }, timeoutMs);
    t.unref();
    this.timers.add(t);
    return note;
  }

  clear() {
    this.currentNote = null;
    this.emit();
  }

  dispose() {
    for (const t of this.timers) clearTimeout(t);
    this.timers.clear();
    this.listeners.clear();
  }

  private emit() {
    for (const l of Array.from(this.listeners)) {
      try { l(this.currentNote); } catch (err) { logger.warn({ err }, 'notification_listener_failed'); }
    }
  }
}
