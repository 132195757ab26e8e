import { AsyncLocalStorage } from 'node:async_hooks';

export interface LogContext {
  conversationId: string;
}

export const logContext = new AsyncLocalStorage<LogContext>();
