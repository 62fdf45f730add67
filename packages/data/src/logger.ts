/* This Source Code Form is subject to the terms of the Mozilla Public
 * License, v. 2.0. If a copy of the MPL was not distributed with this
 * file, You can obtain one at https://mozilla.org/MPL/2.0/. */

/**
 * Console logging for the meshsync packages
 *
 * error and warn always print. info and debug print only when
 * MESHSYNC_DEBUG=true is set in the environment, or in localStorage
 * when running in a browser.
 *
 * Lines read `[Component] operation kind/id <Entity> message`, with the
 * parts of the context that were given.
 */

type Level = 'error' | 'warn' | 'info' | 'debug';

export interface LogContext {
  /** Operation being performed (e.g. 'upload', 'validate') */
  operation?: string;
  /** Remote resource id */
  resourceId?: string;
  resourceKind?: string;
  /** Entity type the message is about (e.g. 'DataArray') */
  entity?: string;
  /** Extra values printed after the message */
  data?: Record<string, unknown>;
}

const SINKS: Record<Level, (...args: unknown[]) => void> = {
  error: (...args) => console.error(...args),
  warn: (...args) => console.warn(...args),
  info: (...args) => console.log(...args),
  debug: (...args) => console.debug(...args),
};

function envDebug(): boolean {
  return typeof process !== 'undefined' && process.env.MESHSYNC_DEBUG === 'true';
}

function isDebugEnabled(): boolean {
  if (typeof localStorage === 'undefined') return envDebug();
  try {
    return localStorage.getItem('MESHSYNC_DEBUG') === 'true';
  } catch {
    // storage access can be denied
    return envDebug();
  }
}

function formatPrefix(component: string, ctx: LogContext): string {
  const parts = [`[${component}]`];
  if (ctx.operation) parts.push(ctx.operation);
  if (ctx.resourceKind && ctx.resourceId !== undefined) {
    parts.push(`${ctx.resourceKind}/${ctx.resourceId}`);
  } else if (ctx.resourceKind) {
    parts.push(ctx.resourceKind);
  } else if (ctx.resourceId !== undefined) {
    parts.push(`#${ctx.resourceId}`);
  }
  if (ctx.entity) parts.push(`<${ctx.entity}>`);
  return parts.join(' ');
}

function formatError(error: unknown): string {
  if (error instanceof Error) {
    return `${error.name}: ${error.message}`;
  }
  return String(error);
}

function emit(level: Level, component: string, message: string, ctx: LogContext = {}, error?: unknown): void {
  if ((level === 'info' || level === 'debug') && !isDebugEnabled()) return;
  const args: unknown[] = [`${formatPrefix(component, ctx)} ${message}`];
  if (error !== undefined) args.push(formatError(error));
  if (ctx.data !== undefined) args.push(ctx.data);
  SINKS[level](...args);
}

/**
 * Create a logger for one component
 */
export function createLogger(component: string) {
  return {
    /** Failures surfaced to the caller */
    error(message: string, error?: unknown, ctx?: LogContext): void {
      emit('error', component, message, ctx, error);
    },

    /** Recoverable problems */
    warn(message: string, ctx?: LogContext): void {
      emit('warn', component, message, ctx);
    },

    info(message: string, ctx?: LogContext): void {
      emit('info', component, message, ctx);
    },

    debug(message: string, ctx?: LogContext): void {
      emit('debug', component, message, ctx);
    },
  };
}
