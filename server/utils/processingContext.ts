import { AsyncLocalStorage } from "async_hooks";
import { nanoid } from "nanoid";

export interface ProcessingContext {
  traceId: string;
  filePath?: string;
  startTime: number;
}

const asyncLocalStorage = new AsyncLocalStorage<ProcessingContext>();

export function getContext(): ProcessingContext | undefined {
  return asyncLocalStorage.getStore();
}

export function createContext(filePath?: string): ProcessingContext {
  return {
    traceId: nanoid(12),
    filePath,
    startTime: Date.now(),
  };
}

export function runWithContext<T>(context: ProcessingContext, fn: () => T): T {
  return asyncLocalStorage.run(context, fn);
}
