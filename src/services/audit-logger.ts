import { LogLevel } from '../config/auth-config';

export interface AuditEvent {
  event: string;
  [key: string]: unknown;
}

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4
};

const SENSITIVE_KEYS = new Set([
  'password',
  'newpassword',
  'currentpassword',
  'pin',
  'newpin',
  'currentpin',
  'token',
  'accesstoken',
  'refreshtoken',
  'hash'
]);

export class AuditLogger {
  constructor(private readonly minLevel: LogLevel = 'info') {}

  logAuthenticationEvent(event: AuditEvent): void {
    this.write('info', event);
  }

  logSecurityEvent(event: AuditEvent): void {
    this.write('warn', event);
  }

  logError(event: AuditEvent, error?: unknown): void {
    const reason = error instanceof Error ? error.message : error === undefined ? undefined : String(error);
    this.write('error', reason === undefined ? event : { ...event, error: reason });
  }

  debug(event: AuditEvent): void {
    this.write('debug', event);
  }

  sanitize(event: AuditEvent): AuditEvent {
    const clean: AuditEvent = { event: event.event };
    for (const [key, value] of Object.entries(event)) {
      if (key === 'event') continue;
      clean[key] = SENSITIVE_KEYS.has(key.toLowerCase()) ? '[REDACTED]' : value;
    }
    return clean;
  }

  private write(level: Exclude<LogLevel, 'silent'>, event: AuditEvent): void {
    if (LEVEL_PRIORITY[level] < LEVEL_PRIORITY[this.minLevel]) {
      return;
    }

    const entry = {
      ...this.sanitize(event),
      level,
      timestamp: Date.now()
    };

    if (level === 'error') {
      console.error(entry);
    } else if (level === 'warn') {
      console.warn(entry);
    } else {
      console.log(entry);
    }
  }
}
