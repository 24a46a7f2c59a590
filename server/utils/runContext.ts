import { AsyncLocalStorage } from "async_hooks";

export interface RunContext {
  runId: string;
  source: string;
  startTime: number;
}

const asyncLocalStorage = new AsyncLocalStorage<RunContext>();

export function getRunId(): string | undefined {
  return asyncLocalStorage.getStore()?.runId;
}

export function runWithContext<T>(context: RunContext, fn: () => T): T {
  return asyncLocalStorage.run(context, fn);
}
